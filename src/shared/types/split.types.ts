/**
 * Team Split Ledger - Core Types
 *
 * All amounts are bigint base units of the asset (wei, micros, ...).
 * Shares are integer percentages; a team's shares sum to exactly 100.
 */

export type Address = string;
export type AssetId = string;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

/**
 * Sentinel asset id for the native balance (ETH on an EVM chain)
 */
export const NATIVE_ASSET: AssetId = 'native';

export const TOTAL_PROPORTION = 100;

/**
 * How withdrawals are counted against entitlement
 *
 * per-asset: one counter per (beneficiary, asset)
 * shared:    one counter per beneficiary, summed across every asset
 */
export type WithdrawalAccounting = 'per-asset' | 'shared';

export interface TeamMember {
  readonly address: Address;
  readonly share: number;
}

/**
 * WithdrawalRecord - emitted once per successful withdrawal
 */
export interface WithdrawalRecord {
  readonly id: string;
  readonly beneficiary: Address;
  readonly asset: AssetId;
  readonly amount: bigint;
  readonly tx_hash: string;
  readonly created_at: Date;
}

export interface MemberPosition {
  readonly address: Address;
  readonly share: number;
  readonly withdrawn: bigint;
  readonly entitlement: bigint;
}

/**
 * AssetSummary - settlement view of one asset
 * lifetime_inflow = paid_out + on_hand
 */
export interface AssetSummary {
  readonly asset: AssetId;
  readonly lifetime_inflow: bigint;
  readonly on_hand: bigint;
  readonly paid_out: bigint;
  readonly members: MemberPosition[];
}

export function isZeroAddress(address: Address): boolean {
  return address.trim() === '' || /^0x0{40}$/i.test(address);
}
