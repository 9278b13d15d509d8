/**
 * @ledgerline/ledger — Journal replay and balance reconciliation.
 *
 * The ledger keeps cached balances for O(1) reads. Everything here
 * recomputes them from the journal alone, so the cache can be checked
 * against the entries it was built from and a snapshot can be restored
 * without trusting anything but its lines.
 *
 * Rules:
 * - Balances are computed per-currency (never cross-currency)
 * - A debit line removes value from its account, a credit line adds it
 * - The external account is a counterpart only and has no balance
 * - Every batch must balance (debits = credits per currency)
 */

import type { AccountId, Currency, LedgerEntry } from "@ledgerline/types";
import { formatAmount, parseAmount } from "./money-math.js";
import type {
  BalanceDiscrepancy,
  BalanceTable,
  TrialBalance,
  TrialBalanceLine,
} from "./types.js";

/**
 * Result of replaying a journal from an empty ledger.
 */
export interface ReplayResult {
  readonly balances: BalanceTable;
  /** Batches whose debits and credits differ in some currency. */
  readonly unbalancedBatches: readonly string[];
  /** Lines that left their account below zero, in journal order. */
  readonly overdrafts: readonly LedgerEntry[];
}

interface Totals {
  readonly decimals: number;
  debits: bigint;
  credits: bigint;
}

function addTotals(
  table: Map<string, Totals>,
  key: string,
  entry: LedgerEntry,
  amount: bigint,
): void {
  let totals = table.get(key);
  if (totals === undefined) {
    totals = { decimals: entry.money.decimals, debits: 0n, credits: 0n };
    table.set(key, totals);
  }
  if (entry.type === "debit") {
    totals.debits += amount;
  } else {
    totals.credits += amount;
  }
}

/**
 * Replay journal lines in order and compute every account balance.
 */
export function replayJournal(
  entries: readonly LedgerEntry[],
  externalAccount: AccountId,
): ReplayResult {
  const balances: BalanceTable = new Map();
  const batchTotals = new Map<string, Totals>();
  const overdrafts: LedgerEntry[] = [];

  for (const entry of entries) {
    const amount = parseAmount(entry.money.amount, entry.money.decimals);
    addTotals(batchTotals, `${entry.batchId}::${entry.money.currency}`, entry, amount);

    if (entry.accountId === externalAccount) {
      continue;
    }

    let perCurrency = balances.get(entry.accountId);
    if (perCurrency === undefined) {
      perCurrency = new Map();
      balances.set(entry.accountId, perCurrency);
    }

    const current = perCurrency.get(entry.money.currency) ?? 0n;
    const next = entry.type === "debit" ? current - amount : current + amount;
    if (next < 0n) {
      overdrafts.push(entry);
    }
    perCurrency.set(entry.money.currency, next);
  }

  const unbalanced = new Set<string>();
  for (const [key, totals] of batchTotals) {
    if (totals.debits !== totals.credits) {
      unbalanced.add(key.slice(0, key.lastIndexOf("::")));
    }
  }

  return {
    balances,
    unbalancedBatches: [...unbalanced],
    overdrafts,
  };
}

/**
 * Compare cached balances against a replay. Zero and absent are equal.
 */
export function diffBalances(
  cached: BalanceTable,
  replayed: BalanceTable,
  decimalsOf: (currency: Currency) => number,
): readonly BalanceDiscrepancy[] {
  const discrepancies: BalanceDiscrepancy[] = [];
  const accountIds = new Set<AccountId>([...cached.keys(), ...replayed.keys()]);

  for (const accountId of [...accountIds].sort()) {
    const left = cached.get(accountId);
    const right = replayed.get(accountId);
    const currencies = new Set<Currency>([...(left?.keys() ?? []), ...(right?.keys() ?? [])]);

    for (const currency of [...currencies].sort()) {
      const a = left?.get(currency) ?? 0n;
      const b = right?.get(currency) ?? 0n;
      if (a !== b) {
        const decimals = decimalsOf(currency);
        discrepancies.push({
          accountId,
          currency,
          cached: formatAmount(a, decimals),
          replayed: formatAmount(b, decimals),
        });
      }
    }
  }

  return discrepancies;
}

/**
 * Total debits and credits per currency over the whole journal.
 */
export function computeTrialBalance(
  entries: readonly LedgerEntry[],
  timestamp: string,
): TrialBalance {
  const totals = new Map<string, Totals>();
  for (const entry of entries) {
    addTotals(totals, entry.money.currency, entry, parseAmount(entry.money.amount, entry.money.decimals));
  }

  const lines: TrialBalanceLine[] = [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([currency, t]) => ({
      currency,
      decimals: t.decimals,
      totalDebits: formatAmount(t.debits, t.decimals),
      totalCredits: formatAmount(t.credits, t.decimals),
    }));

  return {
    lines,
    generatedAt: timestamp,
    balanced: [...totals.values()].every((t) => t.debits === t.credits),
  };
}
