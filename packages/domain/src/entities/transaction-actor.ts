import type { IsolationLevel } from './isolation-level.js';

export type ActorState = 'NOT_STARTED' | 'ACTIVE' | 'COMMITTED' | 'ROLLED_BACK' | 'FAILED';

export const TERMINAL_ACTOR_STATES: readonly ActorState[] = ['COMMITTED', 'ROLLED_BACK', 'FAILED'];

export function isTerminalState(state: ActorState): boolean {
  return TERMINAL_ACTOR_STATES.includes(state);
}

export interface ActorSpec {
  readonly role: string;
  readonly isolationLevel: IsolationLevel;
}
