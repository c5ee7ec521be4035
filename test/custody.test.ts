import { describe, it, expect } from '@jest/globals';
import { CustodyError, FailingCustody, InMemoryCustody } from '../src/modules/custody';

const ALICE = '0x2222222222222222222222222222222222222222';

describe('InMemoryCustody', () => {
  it('should accumulate deposits per asset', async () => {
    const custody = new InMemoryCustody();

    expect(custody.deposit('token', 10n)).toBe(10n);
    expect(custody.deposit('token', 5n)).toBe(15n);

    expect(await custody.getBalance('token')).toBe(15n);
    expect(await custody.getBalance('other')).toBe(0n);
  });

  it('should reject non-positive deposits', () => {
    const custody = new InMemoryCustody();

    expect(() => custody.deposit('token', 0n)).toThrow(CustodyError);
    expect(() => custody.deposit('token', -1n)).toThrow('Deposit amount must be positive');
  });

  it('should move funds to the recipient', async () => {
    const custody = new InMemoryCustody();
    custody.deposit('token', 10n);

    const result = await custody.transfer({ asset: 'token', recipient: ALICE, amount: 4n, reference_id: 'ref-1' });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value).toMatchObject({ custody: 'IN_MEMORY', asset: 'token', recipient: ALICE, amount: 4n });
    expect(await custody.getBalance('token')).toBe(6n);
    expect(custody.balanceOf('token', ALICE.toUpperCase())).toBe(4n);
    expect(custody.getTransferHistory()).toEqual([result.value]);
  });

  it('should refuse to pay more than it holds', async () => {
    const custody = new InMemoryCustody();
    custody.deposit('token', 10n);

    const result = await custody.transfer({ asset: 'token', recipient: ALICE, amount: 20n, reference_id: 'ref-1' });

    expect(result).toEqual({
      success: false,
      error: 'Insufficient custody balance: 20 > 10 of token',
      retryable: false,
    });
    expect(await custody.getBalance('token')).toBe(10n);
  });

  it('should call the recipient hook after funds arrive', async () => {
    const custody = new InMemoryCustody();
    custody.deposit('token', 10n);

    const seen: bigint[] = [];
    custody.onTransfer(() => {
      seen.push(custody.balanceOf('token', ALICE));
    });

    await custody.transfer({ asset: 'token', recipient: ALICE, amount: 3n, reference_id: 'ref-1' });

    expect(seen).toEqual([3n]);
  });
});

describe('FailingCustody', () => {
  it('should report deposits but reject transfers', async () => {
    const custody = new FailingCustody('down');
    custody.deposit('token', 10n);

    expect(custody.name).toBe('FAILING');
    expect(await custody.getBalance('token')).toBe(10n);
    expect(await custody.transfer({ asset: 'token', recipient: ALICE, amount: 1n, reference_id: 'ref-1' })).toEqual({
      success: false,
      error: 'down',
      retryable: true,
    });
  });

  it('should throw in throw mode', async () => {
    const custody = new FailingCustody('down', 'throw');

    await expect(
      custody.transfer({ asset: 'token', recipient: ALICE, amount: 1n, reference_id: 'ref-1' })
    ).rejects.toMatchObject({ code: 'CUSTODY_UNAVAILABLE', retryable: true });
  });
});
