/**
 * Team Split Ledger - In-Memory Custody
 *
 * Holds per-asset balances for the ledger and per-recipient balances for
 * everyone it paid. Deposits land in custody directly, the ledger is not told.
 */

import { v4 as uuidv4 } from 'uuid';
import { Address, AssetId } from '../../shared/types';
import {
  AssetCustody,
  CustodyError,
  CustodyResult,
  TransferInstruction,
  TransferReceipt,
} from './custody.port';

/**
 * Runs after funds reach the recipient, before transfer() resolves.
 * Stands in for a recipient contract's receive hook.
 */
export type RecipientHook = (instruction: TransferInstruction) => Promise<void> | void;

export class InMemoryCustody implements AssetCustody {
  readonly name: string = 'IN_MEMORY';

  private readonly holdings: Map<AssetId, bigint> = new Map();
  private readonly recipients: Map<string, bigint> = new Map();
  private readonly transferHistory: TransferReceipt[] = [];
  private recipientHook: RecipientHook | null = null;

  /**
   * Credit custody from outside (a plain token transfer to the ledger)
   */
  deposit(asset: AssetId, amount: bigint): bigint {
    if (amount <= 0n) {
      throw new CustodyError('Deposit amount must be positive', 'INVALID_AMOUNT');
    }

    const held = (this.holdings.get(asset) ?? 0n) + amount;
    this.holdings.set(asset, held);
    console.log(`[Custody] Deposit ${amount} of ${asset} (held: ${held})`);
    return held;
  }

  async getBalance(asset: AssetId): Promise<bigint> {
    return this.holdings.get(asset) ?? 0n;
  }

  async transfer(instruction: TransferInstruction): Promise<CustodyResult<TransferReceipt>> {
    const { asset, recipient, amount } = instruction;

    if (amount <= 0n) {
      return { success: false, error: 'Transfer amount must be positive', retryable: false };
    }

    const held = this.holdings.get(asset) ?? 0n;
    if (amount > held) {
      return {
        success: false,
        error: `Insufficient custody balance: ${amount} > ${held} of ${asset}`,
        retryable: false,
      };
    }

    this.move(asset, recipient, amount);

    if (this.recipientHook) {
      try {
        await this.recipientHook(instruction);
      } catch (error) {
        this.move(asset, recipient, -amount);
        throw error;
      }
    }

    const receipt: TransferReceipt = {
      tx_hash: `tx_custody_${uuidv4().replace(/-/g, '')}`,
      custody: this.name,
      asset,
      recipient,
      amount,
      processed_at: new Date(),
    };
    this.transferHistory.push(receipt);

    console.log(`[Custody] Transferred ${amount} of ${asset} to ${recipient} (${receipt.tx_hash})`);
    return { success: true, value: receipt };
  }

  /**
   * Amount of `asset` paid out to `address` so far
   */
  balanceOf(asset: AssetId, address: Address): bigint {
    return this.recipients.get(this.recipientKey(asset, address)) ?? 0n;
  }

  onTransfer(hook: RecipientHook | null): void {
    this.recipientHook = hook;
  }

  getTransferHistory(): TransferReceipt[] {
    return [...this.transferHistory];
  }

  private move(asset: AssetId, recipient: Address, amount: bigint): void {
    const key = this.recipientKey(asset, recipient);
    this.holdings.set(asset, (this.holdings.get(asset) ?? 0n) - amount);
    this.recipients.set(key, (this.recipients.get(key) ?? 0n) + amount);
  }

  private recipientKey(asset: AssetId, address: Address): string {
    return `${asset}:${address.toLowerCase()}`;
  }
}

/**
 * FailingCustody - For testing failure scenarios
 * Reports balances like InMemoryCustody but never pays out.
 */
export class FailingCustody extends InMemoryCustody {
  readonly name: string = 'FAILING';

  constructor(
    private readonly failureMessage: string = 'Simulated custody failure',
    private readonly mode: 'reject' | 'throw' = 'reject'
  ) {
    super();
  }

  async transfer(_instruction: TransferInstruction): Promise<CustodyResult<TransferReceipt>> {
    console.error(`[Custody] Transfer failed: ${this.failureMessage}`);

    if (this.mode === 'throw') {
      throw new CustodyError(this.failureMessage, 'CUSTODY_UNAVAILABLE', true);
    }

    return { success: false, error: this.failureMessage, retryable: true };
  }
}
