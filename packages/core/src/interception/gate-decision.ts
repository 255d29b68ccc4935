/**
 * GateDecision — result of the pre-call gate.
 *
 * Reports whether the intercepted call should proceed, plus optional state that
 * is handed unchanged to afterCall, onFailure and cleanup.
 */
export class GateDecision<TState = unknown> {
  static readonly PROCEED = new GateDecision<never>(true);
  static readonly DONT_PROCEED = new GateDecision<never>(false);

  static proceed<TState>(state: TState): GateDecision<TState> {
    return new GateDecision(true, state);
  }

  readonly shouldProceed: boolean;
  readonly state: TState | undefined;

  constructor(shouldProceed: boolean, state?: TState) {
    this.shouldProceed = shouldProceed;
    this.state = state;
  }
}
