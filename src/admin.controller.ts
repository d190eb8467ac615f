import { Body, Controller, Get, Headers, HttpException, HttpStatus, Post, Put } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigStore } from './config-store';
import { GameError } from './errors';

@Controller('api/v1/admin')
export class AdminController {
  constructor(
    private readonly env: ConfigService,
    private readonly config: ConfigStore,
  ) {}

  @Get('config')
  getConfig(@Headers('x-admin-token') token?: string) {
    this.assertAdmin(token);
    return this.config.get();
  }

  @Put('config')
  updateConfig(
    @Headers('x-admin-token') token: string | undefined,
    @Body() body: unknown,
  ) {
    this.assertAdmin(token);
    try {
      const updated = this.config.set(body ?? {});
      return { ok: true, config: updated };
    } catch (e) {
      if (e instanceof GameError) {
        throw new HttpException(e.message, HttpStatus.BAD_REQUEST);
      }
      throw e;
    }
  }

  @Post('config/reset')
  resetConfig(@Headers('x-admin-token') token?: string) {
    this.assertAdmin(token);
    const cfg = this.config.reset();
    return { ok: true, config: cfg };
  }

  private assertAdmin(token?: string) {
    const expected = this.env.get<string>('ADMIN_TOKEN') ?? '';
    if (!expected || token !== expected) {
      throw new HttpException('Unauthorized', HttpStatus.UNAUTHORIZED);
    }
  }
}
