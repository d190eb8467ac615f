export * from './command';
export * from './errors';
export * from './game';
export * from './game-config';
export * from './game-state';
export * from './interface';
export * from './launch-ball';
export * from './lottery';
export * from './rng';
export * from './slot-producer';
export { ConfigStore, DEFAULT_SETTINGS, toGameConfig, type GameSettings } from './config-store';
export { RecordingOutput, type GameEvent, type LotteryContext } from './recording-output';
export { QueuedInput, runQueued } from './queued-input';
