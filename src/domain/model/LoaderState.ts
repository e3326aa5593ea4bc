export const LoaderState = {
  NOT_STARTED: 'NOT_STARTED',
  RUNNING: 'RUNNING',
  TERMINATING: 'TERMINATING',
  EXITED: 'EXITED',
} as const;

export type LoaderState = (typeof LoaderState)[keyof typeof LoaderState];

const VALID_TRANSITIONS: Record<LoaderState, readonly LoaderState[]> = {
  [LoaderState.NOT_STARTED]: [LoaderState.RUNNING],
  [LoaderState.RUNNING]: [LoaderState.TERMINATING],
  [LoaderState.TERMINATING]: [LoaderState.EXITED],
  [LoaderState.EXITED]: [],
};

export function canTransition(from: LoaderState, to: LoaderState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
