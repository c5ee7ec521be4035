/**
 * Team Split Ledger - Asset Custody Port
 *
 * The ledger never moves assets itself. It asks a custody adapter how much
 * of an asset it currently holds and instructs it to pay a beneficiary.
 *
 * Input: TransferInstruction (Asset, Who, Amount)
 * Output: TransferReceipt (Proof of movement)
 */

import { Address, AssetId } from '../../shared/types';

/**
 * Result type for custody operations
 */
export type CustodyResult<T> =
  | { success: true; value: T }
  | { success: false; error: string; retryable: boolean };

export interface TransferInstruction {
  readonly asset: AssetId;
  readonly recipient: Address;
  readonly amount: bigint;
  readonly reference_id: string;      // Withdrawal record id
  readonly memo?: string;
}

export interface TransferReceipt {
  readonly tx_hash: string;
  readonly custody: string;           // Which adapter processed it
  readonly asset: AssetId;
  readonly recipient: Address;
  readonly amount: bigint;
  readonly processed_at: Date;
}

/**
 * AssetCustody - Interface for custody adapters
 *
 * Implementations:
 * - InMemoryCustody (mock mode / tests)
 * - FailingCustody (failure scenarios)
 */
export interface AssetCustody {
  readonly name: string;

  /**
   * Amount of `asset` currently held on behalf of the ledger
   */
  getBalance(asset: AssetId): Promise<bigint>;

  /**
   * Move funds out of custody. May hand control to recipient code
   * before it resolves.
   */
  transfer(instruction: TransferInstruction): Promise<CustodyResult<TransferReceipt>>;
}

export class CustodyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'CustodyError';
  }
}
