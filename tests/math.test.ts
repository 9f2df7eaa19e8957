import { formatFixedPt, maxBig, minBig, mulDiv, mulDivUp, parseFixedPt, signedPerc } from '../src/utils/math';
import { UnacceptableParams } from '../src/core/errors';

describe('Fixed-point helpers', () => {
    test('formatFixedPt renders decimals', () => {
        expect(formatFixedPt(1_500_000n, 6)).toBe('1.5');
        expect(formatFixedPt(25n, 8)).toBe('0.00000025');
        expect(formatFixedPt(-3_000n, 3)).toBe('-3');
    });

    test('parseFixedPt truncates extra digits', () => {
        expect(parseFixedPt('0.1', 8)).toBe(10_000_000n);
        expect(parseFixedPt('1', 6)).toBe(1_000_000n);
        expect(parseFixedPt('0.1234567', 6)).toBe(123_456n);
    });

    test('parseFixedPt rejects garbage', () => {
        expect(() => parseFixedPt('abc', 6)).toThrow(UnacceptableParams);
    });

    test('mulDiv floors, mulDivUp ceils', () => {
        expect(mulDiv(7n, 1n, 2n)).toBe(3n);
        expect(mulDivUp(7n, 1n, 2n)).toBe(4n);
        expect(mulDivUp(8n, 1n, 2n)).toBe(4n);
        expect(() => mulDiv(1n, 1n, 0n)).toThrow(UnacceptableParams);
    });

    test('signedPerc keeps the sign and truncates toward zero', () => {
        expect(signedPerc(200n, 1_000_000n, 8)).toBe(2n);
        expect(signedPerc(150n, -1_000_000n, 8)).toBe(-1n);
    });

    test('min/max', () => {
        expect(minBig(3n, 5n)).toBe(3n);
        expect(maxBig(3n, 5n)).toBe(5n);
    });
});
