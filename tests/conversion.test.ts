/**
 * Tranche Conversion Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Fixed-point tranche ↔ claim conversion. Every division floors, so a round
 * trip never returns more tranches than went in.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { claimToTranches, isConvertible, tranchesToClaim } from '../src/core/conversion';
import { ONE_PRICE, ONE_YIELD } from '../src/config/constants';
import { UnacceptableParams } from '../src/core/errors';

describe('Tranche conversion', () => {
    test('100% yield at unit price converts 1:1', () => {
        expect(tranchesToClaim(200n, ONE_YIELD, ONE_PRICE)).toBe(200n);
        expect(claimToTranches(200n, ONE_YIELD, ONE_PRICE)).toBe(200n);
    });

    test('yield and price scale the claim amount', () => {
        // 100 tranches * 50% = 50 collateral-equivalent, * price 2 = 100 claims
        expect(tranchesToClaim(100n, 500_000n, 2n * ONE_PRICE)).toBe(100n);
        expect(claimToTranches(100n, 500_000n, 2n * ONE_PRICE)).toBe(100n);
    });

    test('floors every division', () => {
        // 7 * 0.333333 = 2.33 → 2
        expect(tranchesToClaim(7n, 333_333n, ONE_PRICE)).toBe(2n);
        // 2 / 0.333333 = 6.000006 → 6
        expect(claimToTranches(2n, 333_333n, ONE_PRICE)).toBe(6n);
    });

    test('round trip never over-returns', () => {
        const yields = [1n, 333_333n, 500_000n, ONE_YIELD, 1_750_000n];
        const prices = [1n, ONE_PRICE / 3n, ONE_PRICE, (ONE_PRICE * 7n) / 5n];
        const amounts = [0n, 1n, 7n, 999n, 123_456_789n];

        for (const y of yields) {
            for (const p of prices) {
                for (const x of amounts) {
                    expect(claimToTranches(tranchesToClaim(x, y, p), y, p)).toBeLessThanOrEqual(x);
                }
            }
        }
    });

    test('zero yield or price is not convertible', () => {
        expect(isConvertible(0n, ONE_PRICE)).toBe(false);
        expect(isConvertible(ONE_YIELD, 0n)).toBe(false);
        expect(isConvertible(ONE_YIELD, ONE_PRICE)).toBe(true);
        expect(() => tranchesToClaim(10n, 0n, ONE_PRICE)).toThrow(UnacceptableParams);
        expect(() => claimToTranches(10n, ONE_YIELD, 0n)).toThrow(UnacceptableParams);
    });

    test('negative amounts are rejected', () => {
        expect(() => tranchesToClaim(-1n, ONE_YIELD, ONE_PRICE)).toThrow(UnacceptableParams);
        expect(() => claimToTranches(-1n, ONE_YIELD, ONE_PRICE)).toThrow(UnacceptableParams);
    });
});
