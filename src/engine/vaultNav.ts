/**
 * Vault NAV Engine
 *
 * Share issuance and redemption against the vault's multi-asset reserve.
 *
 *   mint:    shares = amount * totalShares / TVL        (INITIAL_RATE when empty)
 *   redeem:  payout = balance * shares / totalShares    per tracked asset
 *
 * Both are net of the vault fee: the withheld shares stay unissued (mint)
 * or are burnt without a payout (redeem), which accrues to remaining holders.
 */

import { VAULT_CONSTANTS } from '../config/constants';
import { TokenAmount } from '../types';
import { ReserveEntry } from '../capital/reserveLedger';
import { UnacceptableParams } from '../core/errors';
import { mulDiv, signedPerc } from '../utils/math';

export interface FeeTerms {
    perc: bigint;
    decimals: number;
}

export interface MintQuote {
    shares: bigint;
    fee: bigint;
}

export interface RedemptionQuote {
    payouts: TokenAmount[];
    fee: bigint;
}

export function computeMintAmt(underlyingAmt: bigint, totalShares: bigint, tvl: bigint, fee: FeeTerms): MintQuote {
    if (underlyingAmt < 0n) {
        throw new UnacceptableParams('negative deposit amount', { underlyingAmt: underlyingAmt.toString() });
    }
    if (underlyingAmt === 0n) {
        return { shares: 0n, fee: 0n };
    }
    const gross = totalShares === 0n
        ? underlyingAmt * VAULT_CONSTANTS.INITIAL_RATE
        : mulDiv(underlyingAmt, totalShares, tvl);
    const feeShares = signedPerc(gross, fee.perc, fee.decimals);
    return { shares: gross - feeShares, fee: feeShares };
}

/**
 * Pro-rata slice of every entry, in the order given. No remainder logic:
 * each asset pays `balance * netShares / totalShares`, floored.
 */
export function computeRedemptionAmts(
    entries: ReserveEntry[],
    shareAmt: bigint,
    totalShares: bigint,
    fee: FeeTerms
): RedemptionQuote {
    if (shareAmt < 0n || shareAmt > totalShares) {
        throw new UnacceptableParams('share amount out of range', {
            shareAmt: shareAmt.toString(),
            totalShares: totalShares.toString(),
        });
    }
    if (shareAmt === 0n) {
        return { payouts: [], fee: 0n };
    }
    const feeShares = signedPerc(shareAmt, fee.perc, fee.decimals);
    const netShares = shareAmt - feeShares;
    return {
        payouts: entries.map(({ asset, balance }) => ({ asset, amount: mulDiv(balance, netShares, totalShares) })),
        fee: feeShares,
    };
}

/**
 * Value per share at PRICE-like precision, for monitoring and tests.
 */
export function navPerShare(tvl: bigint, totalShares: bigint, scale: bigint): bigint {
    return totalShares === 0n ? 0n : mulDiv(tvl, scale, totalShares);
}
