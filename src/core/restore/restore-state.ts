// SPDX-License-Identifier: Apache-2.0

export enum RestoreState {
  INIT = 'init',
  VALIDATING = 'validating',
  RESTORING = 'restoring',
  COMPLETE = 'complete',
  FAILED = 'failed',
}

const TRANSITIONS: Readonly<Record<RestoreState, readonly RestoreState[]>> = {
  [RestoreState.INIT]: [RestoreState.VALIDATING, RestoreState.FAILED],
  [RestoreState.VALIDATING]: [RestoreState.RESTORING, RestoreState.FAILED],
  [RestoreState.RESTORING]: [RestoreState.COMPLETE, RestoreState.FAILED],
  [RestoreState.COMPLETE]: [],
  [RestoreState.FAILED]: [],
};

export function canTransition(from: RestoreState, to: RestoreState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: RestoreState): boolean {
  return TRANSITIONS[state].length === 0;
}
