/**
 * Source of the ledger sequence counter. The ledger never generates
 * sequence values itself; it asks the clock once per operation.
 */

import { unixSeconds } from '../utils/time.js';

export interface SequenceClock {
  current(): number;
}

/** Wall-clock seconds since the Unix epoch. */
export class SystemSequenceClock implements SequenceClock {
  current(): number {
    return unixSeconds();
  }
}

/** Clock moved only by explicit calls. Used in tests and local runs. */
export class ManualSequenceClock implements SequenceClock {
  constructor(private sequence = 0) {}

  current(): number {
    return this.sequence;
  }

  set(sequence: number): void {
    if (sequence < this.sequence) {
      throw new RangeError(`Sequence must not move backwards (${this.sequence} -> ${sequence}).`);
    }
    this.sequence = sequence;
  }

  advance(by: number): number {
    this.set(this.sequence + by);
    return this.sequence;
  }
}
