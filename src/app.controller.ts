import {
  Body,
  Controller,
  Get,
  Headers,
  HttpException,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { createHash } from 'crypto';
import { FinishGame, LaunchBall, StartGame, type Command } from './command';
import { ConfigStore } from './config-store';
import type { GameError } from './errors';
import type { GameState } from './game-state';
import type { GameEvent } from './recording-output';
import { SessionService, type Session } from './session.service';
import type { Sym } from './game-config';

const MAX_LAUNCH_COUNT = 1000;

const STATUS_BY_KIND: Record<GameError['kind'], HttpStatus> = {
  InvalidConfig: HttpStatus.BAD_REQUEST,
  InsufficientBalls: HttpStatus.UNPROCESSABLE_ENTITY,
  InvalidCommand: HttpStatus.CONFLICT,
};

export interface CommandResponse {
  state: GameState;
  events: GameEvent<Sym>[];
}

@Controller('api/v1')
export class AppController {
  constructor(
    private readonly sessions: SessionService,
    private readonly config: ConfigStore,
  ) {}

  @Get('health')
  health() {
    const cfgStr = JSON.stringify(this.config.get());
    const cfgHash = createHash('sha1').update(cfgStr).digest('hex').slice(0, 12);
    return {
      ok: true,
      now: Date.now(),
      uptimeSec: Number(process.uptime().toFixed(2)),
      node: process.version,
      configHash: cfgHash,
      sessions: this.sessions.size,
    };
  }

  @Post('auth/guest')
  guest() {
    return { sessionId: this.sessions.create() };
  }

  @Get('game/state')
  state(@Headers('x-session-id') sid?: string) {
    const { game } = this.session(sid);
    return { state: game.state, finished: game.isFinished };
  }

  @Post('game/start')
  start(@Headers('x-session-id') sid?: string): CommandResponse {
    return this.dispatch(this.session(sid), [StartGame]);
  }

  @Post('game/launch')
  launch(
    @Headers('x-session-id') sid: string | undefined,
    @Body('count') count?: unknown,
  ): CommandResponse {
    const session = this.session(sid);

    // Normalize & validate count
    const n = count === undefined ? 1 : Number(count);
    if (!Number.isInteger(n) || n < 1 || n > MAX_LAUNCH_COUNT) {
      throw new HttpException('Bad count', HttpStatus.BAD_REQUEST);
    }

    return this.dispatch(session, Array<Command>(n).fill(LaunchBall));
  }

  @Post('game/finish')
  finish(@Headers('x-session-id') sid?: string): CommandResponse {
    return this.dispatch(this.session(sid), [FinishGame]);
  }

  private session(sid: string | undefined): Session {
    const session = this.sessions.find(sid);
    if (!session) {
      throw new HttpException('Unauthorized', HttpStatus.UNAUTHORIZED);
    }
    return session;
  }

  /** A rejection is an error response only when nothing before it resolved. */
  private dispatch(session: Session, commands: Command[]): CommandResponse {
    const { outcomes, events } = this.sessions.run(session, commands);
    const first = outcomes[0];
    if (first !== undefined && !first.ok) {
      throw new HttpException(first.error.message, STATUS_BY_KIND[first.error.kind]);
    }
    return { state: session.game.state, events };
  }
}
