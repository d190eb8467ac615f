import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AdminController } from './admin.controller';
import { AppController } from './app.controller';
import { ConfigStore } from './config-store';
import { RANDOM_FACTORY, SessionService, defaultRandomFactory } from './session.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
  ],
  controllers: [AppController, AdminController],
  providers: [
    {
      provide: ConfigStore,
      inject: [ConfigService],
      useFactory: (env: ConfigService) =>
        new ConfigStore(env.get<string>('PACHISLO_SETTINGS_FILE') ?? null),
    },
    { provide: RANDOM_FACTORY, useValue: defaultRandomFactory },
    SessionService,
  ],
})
export class AppModule {}
