import { LedgerClock } from "../../application/ports/services";

/**
 * Wall-clock seconds that never move backwards within this process, even when
 * the host clock is adjusted.
 */
export class SystemLedgerClock implements LedgerClock {
  private last = 0n;

  constructor(private readonly nowMs: () => number = Date.now) {}

  timestamp(): bigint {
    const current = BigInt(Math.floor(this.nowMs() / 1000));
    if (current > this.last) {
      this.last = current;
    }
    return this.last;
  }
}
