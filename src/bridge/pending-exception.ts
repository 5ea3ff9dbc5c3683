/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/**
 * One-slot store for an error thrown by caller code that ran inside an
 * engine callback. The callback hands the engine a failure sentinel instead
 * of throwing; the adapter rethrows the stored error once the engine call
 * has returned.
 */
export class PendingException {
  // boxed so that `throw undefined` is still recorded
  private slot: { error: unknown } | undefined;

  get isSet(): boolean {
    return this.slot !== undefined;
  }

  /**
   * Run a callback body. Clears the slot first; a thrown error is stored and
   * `failure` is returned in place of the body's result.
   */
  guard<R>(body: () => R, failure: R): R {
    this.slot = undefined;
    try {
      return body();
    } catch (error) {
      this.slot = { error };
      return failure;
    }
  }

  /** Throw the stored error, clearing the slot. No-op when empty. */
  rethrow(): void {
    const slot = this.slot;
    if (!slot) return;
    this.slot = undefined;
    throw slot.error;
  }
}
