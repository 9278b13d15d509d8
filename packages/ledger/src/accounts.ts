/**
 * @ledgerline/ledger — Account registry.
 *
 * Accounts are created lazily, the first time value reaches them, and are
 * never modified or removed afterwards. The account id alone determines
 * its kind.
 */

import type { AccountId } from "@ledgerline/types";
import { ValidationError } from "./errors.js";
import type { AccountKind, CustodyKind, LedgerAccount } from "./types.js";

/** Counterpart of deposits and withdrawals. Never holds a balance. */
export const EXTERNAL_ACCOUNT = "external:world";

export const DEFAULT_PLATFORM_ACCOUNT = "platform:fees";

const CUSTODY_KINDS: ReadonlySet<string> = new Set<CustodyKind>([
  "escrow",
  "wallet",
  "auction",
  "payment",
]);

/**
 * Ledger account holding the funds of a settlement entity.
 */
export function custodyAccountId(kind: CustodyKind, entityId: string): AccountId {
  return `${kind}:${entityId}`;
}

/**
 * Classify an account id.
 */
export function classifyAccount(id: AccountId, platformAccount: AccountId): AccountKind {
  if (id === EXTERNAL_ACCOUNT) return "external";
  if (id === platformAccount) return "platform";
  const separator = id.indexOf(":");
  if (separator > 0 && CUSTODY_KINDS.has(id.slice(0, separator))) {
    return "custody";
  }
  return "principal";
}

/**
 * Append-only registry of accounts.
 */
export class AccountRegistry {
  private readonly _accounts: Map<AccountId, LedgerAccount> = new Map();
  private readonly _platformAccount: AccountId;

  constructor(platformAccount: AccountId = DEFAULT_PLATFORM_ACCOUNT) {
    this._platformAccount = platformAccount;
  }

  /**
   * Return the account, registering it first if needed.
   */
  ensure(id: AccountId, timestamp: string): LedgerAccount {
    const existing = this._accounts.get(id);
    if (existing !== undefined) {
      return existing;
    }
    assertAccountId(id);

    const account: LedgerAccount = {
      id,
      kind: classifyAccount(id, this._platformAccount),
      createdAt: timestamp,
    };
    this._accounts.set(id, account);
    return account;
  }

  get(id: AccountId): LedgerAccount | undefined {
    return this._accounts.get(id);
  }

  has(id: AccountId): boolean {
    return this._accounts.has(id);
  }

  kindOf(id: AccountId): AccountKind {
    return this._accounts.get(id)?.kind ?? classifyAccount(id, this._platformAccount);
  }

  getAll(): readonly LedgerAccount[] {
    return [...this._accounts.values()];
  }

  get count(): number {
    return this._accounts.size;
  }
}

/**
 * Account ids are non-empty and free of surrounding whitespace.
 */
export function assertAccountId(id: AccountId): void {
  if (typeof id !== "string" || id.length === 0 || id.trim() !== id) {
    throw new ValidationError("INVALID_ACCOUNT", `Invalid account id: "${String(id)}"`);
  }
}
