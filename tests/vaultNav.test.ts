import { computeMintAmt, computeRedemptionAmts, navPerShare } from '../src/engine/vaultNav';
import { UnacceptableParams } from '../src/core/errors';

const NO_FEE = { perc: 0n, decimals: 8 };

describe('computeMintAmt', () => {
    test('empty vault mints at the initial rate', () => {
        expect(computeMintAmt(7n, 0n, 0n, NO_FEE)).toEqual({ shares: 7_000_000n, fee: 0n });
    });

    test('mints pro rata to TVL', () => {
        expect(computeMintAmt(50n, 1000n, 200n, NO_FEE)).toEqual({ shares: 250n, fee: 0n });
    });

    test('fee is taken from the gross shares', () => {
        expect(computeMintAmt(100n, 1000n, 100n, { perc: 2_000_000n, decimals: 8 })).toEqual({ shares: 980n, fee: 20n });
    });

    test('larger deposits never mint fewer shares', () => {
        let previous = 0n;
        for (let amt = 1n; amt <= 50n; amt++) {
            const { shares } = computeMintAmt(amt, 333n, 97n, NO_FEE);
            expect(shares).toBeGreaterThanOrEqual(previous);
            previous = shares;
        }
    });

    test('negative amounts are rejected', () => {
        expect(() => computeMintAmt(-1n, 0n, 0n, NO_FEE)).toThrow(UnacceptableParams);
    });
});

describe('computeRedemptionAmts', () => {
    const entries = [
        { asset: 'A', balance: 300n },
        { asset: 'B', balance: 7n },
    ];

    test('pays every asset pro rata, floored', () => {
        expect(computeRedemptionAmts(entries, 50n, 100n, NO_FEE)).toEqual({
            payouts: [
                { asset: 'A', amount: 150n },
                { asset: 'B', amount: 3n },
            ],
            fee: 0n,
        });
    });

    test('fee shares are burnt without payout', () => {
        expect(computeRedemptionAmts(entries, 100n, 100n, { perc: 10_000_000n, decimals: 8 })).toEqual({
            payouts: [
                { asset: 'A', amount: 270n },
                { asset: 'B', amount: 6n },
            ],
            fee: 10n,
        });
    });

    test('more shares than exist is out of range', () => {
        expect(() => computeRedemptionAmts(entries, 101n, 100n, NO_FEE)).toThrow(UnacceptableParams);
    });
});

describe('navPerShare', () => {
    test('scales TVL per share', () => {
        expect(navPerShare(1500n, 1_500_000_000n, 10n ** 18n)).toBe(10n ** 12n);
        expect(navPerShare(0n, 0n, 10n ** 18n)).toBe(0n);
    });
});
