/**
 * Team Split Ledger - Ledger Service
 * Proportional distribution of every asset the team's custody receives
 *
 * ACCOUNTING LAWS:
 * 1. NO FLOATING POINT: amounts are bigint base units, shares integer percent.
 * 2. LIFETIME INFLOW = paid out (totalBalance) + currently held (custody).
 *    Deposits need no hook; they show up in the custody balance.
 * 3. ENTITLEMENT = floor(lifetime * share / 100) - withdrawn.
 * 4. COMMIT BEFORE TRANSFER: counters move before custody is called, and
 *    move back if custody fails.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';
import {
  Address,
  AssetId,
  AssetSummary,
  MemberPosition,
  TeamMember,
  TOTAL_PROPORTION,
  WithdrawalAccounting,
  WithdrawalRecord,
  isZeroAddress,
} from '../../shared/types';
import { AssetCustody, CustodyResult, TransferReceipt } from '../../modules/custody';

export type SplitLedgerErrorCode =
  | 'EMPTY_TEAM'
  | 'LENGTH_MISMATCH'
  | 'INVALID_ADDRESS'
  | 'BAD_PROPORTION'
  | 'NOT_OWNER'
  | 'NO_USER_PROPORTION'
  | 'NO_BALANCE_TO_WITHDRAW'
  | 'INSUFFICIENT_ENTITLEMENT'
  | 'TRANSFER_FAILED'
  | 'REENTRANT_CALL';

export class SplitLedgerError extends Error {
  constructor(
    public readonly code: SplitLedgerErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'SplitLedgerError';
  }
}

export interface SplitLedgerOptions {
  readonly accounting?: WithdrawalAccounting;
}

export interface CreateSplitLedgerParams extends SplitLedgerOptions {
  readonly members: readonly TeamMember[];
  readonly creator: Address;
  readonly custody: AssetCustody;
}

export type WithdrawalListener = (record: WithdrawalRecord) => void;

interface WithdrawalScope {
  readonly ledger: SplitLedger;
  active: boolean;
}

/**
 * Withdrawals the current async context was started from. Callbacks created
 * during a withdrawal keep the scope after it settles, so only an active
 * entry for the same ledger counts as re-entry.
 */
const activeWithdrawals = new AsyncLocalStorage<readonly WithdrawalScope[]>();

export class SplitLedger {
  readonly owner: Address;
  readonly accounting: WithdrawalAccounting;

  private readonly shares: Map<Address, number>;
  private readonly totalBalances: Map<AssetId, bigint> = new Map();
  private readonly withdrawnAmounts: Map<string, bigint> = new Map();
  private readonly history: WithdrawalRecord[] = [];
  private readonly listeners: Set<WithdrawalListener> = new Set();
  private readonly unpublished: WithdrawalRecord[] = [];
  private queue: Promise<void> = Promise.resolve();

  private constructor(
    owner: Address,
    shares: Map<Address, number>,
    private readonly custody: AssetCustody,
    accounting: WithdrawalAccounting
  ) {
    this.owner = owner;
    this.shares = shares;
    this.accounting = accounting;
  }

  /**
   * Build a ledger from (address, share) pairs
   *
   * A repeated address keeps its last share; the 100 check sums the raw list.
   * A share of 0 registers the address without any entitlement.
   */
  static create(params: CreateSplitLedgerParams): SplitLedger {
    const { members, creator, custody } = params;

    if (members.length === 0) {
      throw new SplitLedgerError('EMPTY_TEAM', 'Team length must be bigger than 0');
    }

    if (isZeroAddress(creator)) {
      throw new SplitLedgerError('INVALID_ADDRESS', 'Owner cannot be the zero address');
    }

    const shares = new Map<Address, number>();
    let total = 0;

    for (const member of members) {
      if (isZeroAddress(member.address)) {
        throw new SplitLedgerError('INVALID_ADDRESS', 'Team member cannot be the zero address');
      }
      if (!Number.isInteger(member.share) || member.share < 0 || member.share > TOTAL_PROPORTION) {
        throw new SplitLedgerError(
          'BAD_PROPORTION',
          `Proportion must be an integer between 0 and ${TOTAL_PROPORTION}, got ${member.share}`
        );
      }

      shares.set(member.address, member.share);
      total += member.share;
    }

    if (total !== TOTAL_PROPORTION) {
      throw new SplitLedgerError('BAD_PROPORTION', `Total proportion must equal ${TOTAL_PROPORTION}`);
    }

    const accounting = params.accounting ?? 'per-asset';
    console.log(
      `[SplitLedger] Created for ${shares.size} members (owner: ${creator}, accounting: ${accounting})`
    );

    return new SplitLedger(creator, shares, custody, accounting);
  }

  /**
   * Build a ledger from parallel address and share lists
   */
  static fromArrays(
    addresses: readonly Address[],
    shares: readonly number[],
    creator: Address,
    custody: AssetCustody,
    options: SplitLedgerOptions = {}
  ): SplitLedger {
    if (addresses.length === 0) {
      throw new SplitLedgerError('EMPTY_TEAM', 'Team length must be bigger than 0');
    }
    if (addresses.length !== shares.length) {
      throw new SplitLedgerError('LENGTH_MISMATCH', 'Team and proportions length mismatch');
    }

    const members = addresses.map((address, i) => ({ address, share: shares[i] }));
    return SplitLedger.create({ members, creator, custody, ...options });
  }

  // ============================================
  // READ ACCESSORS
  // ============================================

  shareOf(address: Address): number {
    return this.shares.get(address) ?? 0;
  }

  members(): TeamMember[] {
    return Array.from(this.shares, ([address, share]) => ({ address, share }));
  }

  /**
   * Amount of `asset` already paid out. Never decreases.
   */
  totalBalance(asset: AssetId): bigint {
    return this.totalBalances.get(asset) ?? 0n;
  }

  /**
   * Amount counted against `beneficiary` for `asset`.
   * In shared accounting this is the same figure for every asset.
   */
  withdrawn(beneficiary: Address, asset: AssetId): bigint {
    return this.withdrawnAmounts.get(this.withdrawnKey(beneficiary, asset)) ?? 0n;
  }

  withdrawals(): WithdrawalRecord[] {
    return [...this.history];
  }

  onWithdrawn(listener: WithdrawalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Share-weighted portion of lifetime inflow minus what was already counted.
   * Negative when the shared counter has run ahead of this asset's entitlement.
   */
  async rawEntitlement(asset: AssetId, beneficiary: Address): Promise<bigint> {
    const onHand = await this.custody.getBalance(asset);
    return this.computeEntitlement(asset, beneficiary, onHand);
  }

  /**
   * What `beneficiary` could withdraw of `asset` right now. Never fails;
   * 0 for addresses outside the team.
   */
  async entitlement(asset: AssetId, beneficiary: Address): Promise<bigint> {
    const raw = await this.rawEntitlement(asset, beneficiary);
    return raw > 0n ? raw : 0n;
  }

  async summary(asset: AssetId): Promise<AssetSummary> {
    const onHand = await this.custody.getBalance(asset);
    const paidOut = this.totalBalance(asset);

    const members: MemberPosition[] = this.members().map(({ address, share }) => {
      const raw = this.computeEntitlement(asset, address, onHand);
      return {
        address,
        share,
        withdrawn: this.withdrawn(address, asset),
        entitlement: raw > 0n ? raw : 0n,
      };
    });

    return {
      asset,
      lifetime_inflow: paidOut + onHand,
      on_hand: onHand,
      paid_out: paidOut,
      members,
    };
  }

  // ============================================
  // WITHDRAWALS (OWNER ONLY)
  // ============================================

  /**
   * Pay `beneficiary` everything they are owed of `asset`
   */
  async withdraw(caller: Address, asset: AssetId, beneficiary: Address): Promise<WithdrawalRecord> {
    return this.exclusive(() => this.settle(caller, asset, beneficiary));
  }

  /**
   * Pay every member with a positive entitlement, in member order.
   * Members with nothing to withdraw are skipped.
   */
  async withdrawAll(caller: Address, asset: AssetId): Promise<WithdrawalRecord[]> {
    return this.exclusive(async () => {
      this.assertOwner(caller);

      const records: WithdrawalRecord[] = [];
      for (const { address, share } of this.members()) {
        if (share === 0) continue;

        try {
          records.push(await this.settle(caller, asset, address));
        } catch (error) {
          if (error instanceof SplitLedgerError && error.code === 'NO_BALANCE_TO_WITHDRAW') {
            continue;
          }
          throw error;
        }
      }

      console.log(`[SplitLedger] Sweep of ${asset} paid ${records.length} members`);
      return records;
    });
  }

  private async settle(caller: Address, asset: AssetId, beneficiary: Address): Promise<WithdrawalRecord> {
    this.assertOwner(caller);

    if (this.shareOf(beneficiary) === 0) {
      throw new SplitLedgerError('NO_USER_PROPORTION', 'User has no proportion assigned');
    }

    const onHand = await this.custody.getBalance(asset);
    const available = this.computeEntitlement(asset, beneficiary, onHand);

    if (available < 0n) {
      throw new SplitLedgerError(
        'INSUFFICIENT_ENTITLEMENT',
        `Withdrawn amount exceeds entitlement by ${-available} for ${beneficiary} on ${asset}`
      );
    }
    if (available === 0n) {
      throw new SplitLedgerError('NO_BALANCE_TO_WITHDRAW', 'No balance available to withdraw');
    }

    // Commit first: a callback from custody must see the new counters
    const key = this.withdrawnKey(beneficiary, asset);
    const previousTotal = this.totalBalance(asset);
    const previousWithdrawn = this.withdrawnAmounts.get(key) ?? 0n;
    this.totalBalances.set(asset, previousTotal + available);
    this.withdrawnAmounts.set(key, previousWithdrawn + available);

    const rollback = (reason: string): SplitLedgerError => {
      this.totalBalances.set(asset, previousTotal);
      this.withdrawnAmounts.set(key, previousWithdrawn);
      console.error(`[SplitLedger] Transfer of ${available} ${asset} to ${beneficiary} failed: ${reason}`);
      return new SplitLedgerError('TRANSFER_FAILED', `Transfer failed: ${reason}`);
    };

    const id = uuidv4();
    let result: CustodyResult<TransferReceipt>;
    try {
      result = await this.custody.transfer({
        asset,
        recipient: beneficiary,
        amount: available,
        reference_id: id,
        memo: `Team share withdrawal for ${beneficiary}`,
      });
    } catch (error) {
      throw rollback(error instanceof Error ? error.message : String(error));
    }

    if (!result.success) {
      throw rollback(result.error);
    }

    const record: WithdrawalRecord = {
      id,
      beneficiary,
      asset,
      amount: available,
      tx_hash: result.value.tx_hash,
      created_at: result.value.processed_at,
    };
    this.history.push(record);

    console.log(`[SplitLedger] Withdrawn ${available} of ${asset} to ${beneficiary}`);
    this.unpublished.push(record);

    return record;
  }

  private computeEntitlement(asset: AssetId, beneficiary: Address, onHand: bigint): bigint {
    const lifetime = this.totalBalance(asset) + onHand;
    const entitled = (lifetime * BigInt(this.shareOf(beneficiary))) / BigInt(TOTAL_PROPORTION);
    return entitled - this.withdrawn(beneficiary, asset);
  }

  private withdrawnKey(beneficiary: Address, asset: AssetId): string {
    return this.accounting === 'shared' ? beneficiary : `${beneficiary}|${asset}`;
  }

  private assertOwner(caller: Address): void {
    if (caller !== this.owner) {
      throw new SplitLedgerError('NOT_OWNER', 'Caller is not the ledger owner');
    }
  }

  /**
   * Serialize withdrawals on this ledger. Re-entry from inside a running
   * withdrawal (a custody callback) is rejected instead of queued.
   * Listeners run once the withdrawal has settled and may queue another.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const outer = activeWithdrawals.getStore() ?? [];
    if (outer.some(scope => scope.ledger === this && scope.active)) {
      return Promise.reject(
        new SplitLedgerError('REENTRANT_CALL', 'Withdrawal already in progress on this ledger')
      );
    }

    const current: WithdrawalScope = { ledger: this, active: true };
    const scopes = [...outer.filter(scope => scope.active), current];

    return activeWithdrawals.run(scopes, () => {
      const run = this.queue.then(async () => {
        try {
          return await task();
        } finally {
          current.active = false;
          this.publishSettled();
        }
      });
      this.queue = run.then(
        () => undefined,
        () => undefined
      );
      return run;
    });
  }

  private publishSettled(): void {
    for (const record of this.unpublished.splice(0)) {
      this.publish(record);
    }
  }

  private publish(record: WithdrawalRecord): void {
    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (error) {
        console.error(`[SplitLedger] Withdrawal listener failed for ${record.id}:`, error);
      }
    }
  }
}
