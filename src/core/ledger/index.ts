/**
 * Team Split Ledger - Ledger Module Export
 */

export {
  SplitLedger,
  SplitLedgerError,
  SplitLedgerErrorCode,
  SplitLedgerOptions,
  CreateSplitLedgerParams,
  WithdrawalListener,
} from './split-ledger.service';
