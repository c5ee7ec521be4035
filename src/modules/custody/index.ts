/**
 * Team Split Ledger - Custody Module Export
 */

export {
  AssetCustody,
  CustodyResult,
  CustodyError,
  TransferInstruction,
  TransferReceipt,
} from './custody.port';
export { InMemoryCustody, FailingCustody, RecipientHook } from './in-memory.custody';
