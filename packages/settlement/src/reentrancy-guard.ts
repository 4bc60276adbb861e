/**
 * @splitpact/settlement — Non-reentrant guard.
 *
 * A scoped lock: `run` holds it for the whole of `work`, across every
 * await, and releases it on every exit path. A second `run` while the
 * lock is held is refused before `work` starts.
 *
 * The lock does not tell a nested call from an unrelated concurrent
 * one: both are refused with REENTRANT_CALL, never queued. Callers that
 * settle in parallel retry after the first call returns.
 */

import { SettlementError } from "./types.js";

export class NonReentrantGuard {
  private _held = false;

  get held(): boolean {
    return this._held;
  }

  async run<T>(work: () => Promise<T>): Promise<T> {
    if (this._held) {
      throw new SettlementError(
        "REENTRANT_CALL",
        "A settlement is already in progress on this engine; concurrent calls are refused, not queued",
      );
    }
    this._held = true;
    try {
      return await work();
    } finally {
      this._held = false;
    }
  }
}
