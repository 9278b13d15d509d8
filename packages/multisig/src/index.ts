/**
 * @ledgerline/multisig — N-of-M multi-signature wallets.
 */

export { MultiSigWalletManager } from "./wallet.js";
export { CallTargetRegistry } from "./call-targets.js";
export type {
  AddOwnerCommand,
  CallContext,
  CallTarget,
  ChangeThresholdCommand,
  ForwardCommand,
  GovernanceCommand,
  MultiSigConfig,
  MultiSigWallet,
  PendingTransaction,
  RemoveOwnerCommand,
  TransactionFilter,
  TransactionOutcome,
  TransactionState,
  TransferCommand,
  WalletCommand,
  WalletStatus,
} from "./types.js";
