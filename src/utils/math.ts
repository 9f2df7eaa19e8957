import BigNumber from 'bignumber.js';
import { UnacceptableParams } from '../core/errors';

export const toBigNumber = (value: bigint | string | number): BigNumber => {
    return new BigNumber(typeof value === 'bigint' ? value.toString() : value);
};

/**
 * Render a fixed-point integer for log lines, e.g. formatFixedPt(1500000n, 6) => "1.5"
 */
export const formatFixedPt = (value: bigint, decimals: number): string => {
    return toBigNumber(value).shiftedBy(-decimals).toFixed();
};

/**
 * Parse a decimal string into a fixed-point integer, truncating extra digits.
 */
export const parseFixedPt = (value: string, decimals: number): bigint => {
    const scaled = toBigNumber(value).shiftedBy(decimals).integerValue(BigNumber.ROUND_DOWN);
    if (!scaled.isFinite()) {
        throw new UnacceptableParams(`not a number: ${value}`);
    }
    return BigInt(scaled.toFixed());
};

export const pow10 = (decimals: number): bigint => 10n ** BigInt(decimals);

export const minBig = (a: bigint, b: bigint): bigint => (a < b ? a : b);
export const maxBig = (a: bigint, b: bigint): bigint => (a > b ? a : b);

/**
 * floor(a * b / d) for non-negative operands.
 */
export const mulDiv = (a: bigint, b: bigint, d: bigint): bigint => {
    if (d === 0n) {
        throw new UnacceptableParams('division by zero', { a: a.toString(), b: b.toString() });
    }
    return (a * b) / d;
};

/**
 * ceil(a * b / d) for non-negative operands.
 */
export const mulDivUp = (a: bigint, b: bigint, d: bigint): bigint => {
    if (d === 0n) {
        throw new UnacceptableParams('division by zero', { a: a.toString(), b: b.toString() });
    }
    const product = a * b;
    return product % d === 0n ? product / d : product / d + 1n;
};

/**
 * Signed percentage of an amount. Truncates toward zero.
 */
export const signedPerc = (amount: bigint, perc: bigint, decimals: number): bigint => {
    return (amount * perc) / pow10(decimals);
};
