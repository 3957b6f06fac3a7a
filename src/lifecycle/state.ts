export const lifecycleStates = [
  'Unconfigured',
  'Configuring',
  'Configured',
  'Running',
  'ShuttingDown',
  'Terminated',
] as const;

export type LifecycleState = (typeof lifecycleStates)[number];

export class IllegalTransitionError extends Error {
  constructor(from: LifecycleState, to: LifecycleState) {
    super(`Illegal lifecycle transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

function rank(state: LifecycleState): number {
  return lifecycleStates.indexOf(state);
}

/**
 * Forward-only state holder. The single backward edge is Configuring ->
 * Unconfigured, taken when validation or auth fails before exit.
 */
export class LifecycleStateMachine {
  #state: LifecycleState = 'Unconfigured';
  readonly #onTransition: ((from: LifecycleState, to: LifecycleState) => void) | undefined;

  constructor(onTransition?: (from: LifecycleState, to: LifecycleState) => void) {
    this.#onTransition = onTransition;
  }

  get state(): LifecycleState {
    return this.#state;
  }

  canTransition(to: LifecycleState): boolean {
    const from = this.#state;
    if (from === 'Configuring' && to === 'Unconfigured') return true;
    return rank(to) > rank(from);
  }

  transition(to: LifecycleState): void {
    const from = this.#state;
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(from, to);
    }
    this.#state = to;
    this.#onTransition?.(from, to);
  }
}
