import { KubetestError } from '../errors.js';

export type NamespacePhase = 'Pending' | 'Active' | 'Terminating' | 'Gone';

const PHASE_ORDER: Record<NamespacePhase, number> = {
  Pending: 0,
  Active: 1,
  Terminating: 2,
  Gone: 3,
};

/**
 * The namespace one test runs in. Phases only move forward; Gone is terminal.
 */
export class TestNamespace {
  private currentPhase: NamespacePhase = 'Pending';

  constructor(
    readonly name: string,
    /** False when the test borrowed an existing namespace the harness must not delete */
    readonly managed: boolean,
    readonly testName?: string
  ) {}

  get phase(): NamespacePhase {
    return this.currentPhase;
  }

  /**
   * Move to a later phase; moving to the current phase is a no-op
   *
   * @throws KubetestError on a backwards transition
   */
  transition(phase: NamespacePhase): void {
    if (phase === this.currentPhase) {
      return;
    }
    if (PHASE_ORDER[phase] < PHASE_ORDER[this.currentPhase]) {
      throw new KubetestError(
        `Namespace "${this.name}" cannot move from ${this.currentPhase} back to ${phase}`,
        'INVALID_NAMESPACE_TRANSITION',
        { namespace: this.name, from: this.currentPhase, to: phase }
      );
    }
    this.currentPhase = phase;
  }

  toString(): string {
    return this.name;
  }
}
