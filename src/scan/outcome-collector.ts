/**
 * Outcome collector
 * Completion point that every scan task reports to exactly once
 */

import type { ProbeOutcome } from '../types/scan.js';

/**
 * Collects outcomes by input position and settles once the expected
 * number of reports has arrived. Completion is decided by counting, not by
 * producers signalling that they are done.
 */
export class OutcomeCollector {
  readonly expected: number;
  /** Resolves with the outcomes in input order */
  readonly done: Promise<ProbeOutcome[]>;

  private readonly slots: Array<ProbeOutcome | undefined>;
  private received = 0;
  private settled = false;
  private resolveDone: (outcomes: ProbeOutcome[]) => void = () => undefined;
  private rejectDone: (error: Error) => void = () => undefined;

  constructor(expected: number) {
    if (!Number.isInteger(expected) || expected < 0) {
      throw new RangeError(`Expected outcome count must be a non-negative integer, got ${expected}`);
    }
    this.expected = expected;
    this.slots = new Array<ProbeOutcome | undefined>(expected).fill(undefined);
    this.done = new Promise<ProbeOutcome[]>((resolve, reject) => {
      this.resolveDone = resolve;
      this.rejectDone = reject;
    });

    if (expected === 0) {
      this.settle();
    }
  }

  /** Reports received so far */
  get count(): number {
    return this.received;
  }

  /**
   * Record the outcome for one input position
   */
  submit(index: number, outcome: ProbeOutcome): void {
    if (this.settled) {
      throw new Error(`Outcome for position ${index} arrived after the collection settled`);
    }
    if (!Number.isInteger(index) || index < 0 || index >= this.expected) {
      this.abort(new RangeError(`Outcome position ${index} is outside 0..${this.expected - 1}`));
      return;
    }
    if (this.slots[index] !== undefined) {
      this.abort(new Error(`Duplicate outcome for position ${index}`));
      return;
    }

    this.slots[index] = outcome;
    this.received++;

    if (this.received === this.expected) {
      this.settle();
    }
  }

  /**
   * Fail the whole collection. Only used for internal faults.
   */
  abort(error: Error): void {
    if (this.settled) {
      return;
    }
    this.settled = true;
    this.rejectDone(error);
  }

  private settle(): void {
    const outcomes: ProbeOutcome[] = [];
    for (const [index, outcome] of this.slots.entries()) {
      if (outcome === undefined) {
        this.abort(new Error(`Missing outcome for position ${index}`));
        return;
      }
      outcomes.push(outcome);
    }
    this.settled = true;
    this.resolveDone(outcomes);
  }
}
