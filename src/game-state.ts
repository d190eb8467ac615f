export type GameState =
  | { readonly mode: 'uninitialized' }
  | { readonly mode: 'normal'; readonly balls: number }
  | { readonly mode: 'rush'; readonly balls: number; readonly rushCount: number };

export type StartedState = Exclude<GameState, { mode: 'uninitialized' }>;

export interface Transition {
  before: GameState | null;
  after: GameState;
}

export const UNINITIALIZED: GameState = Object.freeze({ mode: 'uninitialized' });

export const normalState = (balls: number): GameState => ({ mode: 'normal', balls });

export const rushState = (balls: number, rushCount: number): GameState => ({
  mode: 'rush',
  balls,
  rushCount,
});

export function isStarted(state: GameState): state is StartedState {
  return state.mode !== 'uninitialized';
}

export function describeState(state: GameState): string {
  switch (state.mode) {
    case 'uninitialized':
      return 'Uninitialized';
    case 'normal':
      return `Normal { balls: ${state.balls} }`;
    case 'rush':
      return `Rush { balls: ${state.balls}, rushCount: ${state.rushCount} }`;
  }
}
