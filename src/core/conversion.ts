/**
 * Tranche Conversion Engine
 *
 * Pure fixed-point conversions between tranche units and claim-token units.
 *
 *   claim   = (tranches * yield / 10^YIELD_DECIMALS) * price / 10^PRICE_DECIMALS
 *   tranche = (claim * 10^PRICE_DECIMALS / price) * 10^YIELD_DECIMALS / yield
 *
 * Every division floors. Claims are under-issued and tranches over-consumed
 * relative to the exact rational result, never the other way round, so a
 * round trip can only lose units:
 *
 *   claimToTranches(tranchesToClaim(x, y, p), y, p) <= x
 *
 * A zero yield or price has no conversion. Callers check for it first; the
 * functions themselves throw UnacceptableParams.
 */

import { ONE_PRICE, ONE_YIELD } from '../config/constants';
import { UnacceptableParams } from './errors';

function assertConvertible(yieldFactor: bigint, price: bigint): void {
    if (yieldFactor <= 0n || price <= 0n) {
        throw new UnacceptableParams('zero yield or price is not convertible', {
            yieldFactor: yieldFactor.toString(),
            price: price.toString(),
        });
    }
}

export function tranchesToClaim(trancheAmt: bigint, yieldFactor: bigint, price: bigint): bigint {
    assertConvertible(yieldFactor, price);
    if (trancheAmt < 0n) {
        throw new UnacceptableParams('negative tranche amount', { trancheAmt: trancheAmt.toString() });
    }
    return (((trancheAmt * yieldFactor) / ONE_YIELD) * price) / ONE_PRICE;
}

export function claimToTranches(claimAmt: bigint, yieldFactor: bigint, price: bigint): bigint {
    assertConvertible(yieldFactor, price);
    if (claimAmt < 0n) {
        throw new UnacceptableParams('negative claim amount', { claimAmt: claimAmt.toString() });
    }
    return (((claimAmt * ONE_PRICE) / price) * ONE_YIELD) / yieldFactor;
}

/**
 * True when both factors are non-zero, i.e. the conversions above will not throw.
 */
export function isConvertible(yieldFactor: bigint, price: bigint): boolean {
    return yieldFactor > 0n && price > 0n;
}
