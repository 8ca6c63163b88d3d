import { fail, ok, Result } from '../result';

export type TransitionTable<S extends string> = Record<S, readonly S[]>;

export class StateMachine<S extends string> {
  constructor(
    private readonly entity: string,
    private readonly transitions: TransitionTable<S>,
  ) {}

  canTransition(current: S, next: S): boolean {
    return this.transitions[current].includes(next);
  }

  isTerminal(state: S): boolean {
    return this.transitions[state].length === 0;
  }

  check(current: S, next: S): Result {
    const allowed = this.transitions[current];

    if (!allowed.includes(next)) {
      return fail(
        'validation',
        `Invalid ${this.entity} status transition: "${current}" → "${next}". ` +
          (allowed.length
            ? `Allowed transitions from "${current}": ${allowed.join(', ')}.`
            : `"${current}" is a terminal state and cannot be transitioned.`),
      );
    }

    return ok(undefined, `${this.entity} may move to "${next}"`);
  }
}
