/**
 * Registry of forward destinations, keyed by account id.
 */

import { assertAccountId, ValidationError } from "@ledgerline/ledger";
import type { AccountId } from "@ledgerline/types";
import type { CallTarget } from "./types.js";

export class CallTargetRegistry {
  private readonly targets: Map<AccountId, CallTarget> = new Map();

  register(address: AccountId, target: CallTarget): void {
    assertAccountId(address);
    this.targets.set(address, target);
  }

  unregister(address: AccountId): boolean {
    return this.targets.delete(address);
  }

  has(address: AccountId): boolean {
    return this.targets.has(address);
  }

  /** Throws UNKNOWN_CALL_TARGET when nothing is registered. */
  resolve(address: AccountId): CallTarget {
    const target = this.targets.get(address);
    if (target === undefined) {
      throw new ValidationError("UNKNOWN_CALL_TARGET", `No call target registered at "${address}"`, { target: address });
    }
    return target;
  }

  addresses(): readonly AccountId[] {
    return [...this.targets.keys()];
  }
}
