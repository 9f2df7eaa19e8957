/**
 * Asset valuation in units of the underlying collateral.
 *
 *   collateral  → 1:1
 *   tranche     → balance * trancheCollateral / trancheSupply   (bond waterfall)
 *   claim token → balance * claimTVL / claimSupply              (optional)
 */

import { AssetId, ValuationFn } from '../types';
import { UnexpectedAsset } from '../core/errors';
import { mulDiv } from '../utils/math';
import { BondFactory } from './bondFactory';

export interface ClaimTokenValuation {
    asset: AssetId;
    tvl(): bigint;
    supply(): bigint;
}

export interface ValuationOptions {
    collateral: AssetId;
    bonds: BondFactory;
    claimToken?: ClaimTokenValuation;
}

export function trancheValue(bonds: BondFactory, asset: AssetId, balance: bigint): bigint | null {
    const tranche = bonds.trancheOf(asset);
    if (!tranche) {
        return null;
    }
    const { collateral, supply } = bonds.controller(tranche.bondId).getTrancheCollateralization(tranche.seniority);
    return supply === 0n ? 0n : mulDiv(balance, collateral, supply);
}

export function createValuation(options: ValuationOptions): ValuationFn {
    const { collateral, bonds, claimToken } = options;

    return (asset: AssetId, balance: bigint): bigint => {
        if (asset === collateral) {
            return balance;
        }
        if (claimToken && asset === claimToken.asset) {
            const supply = claimToken.supply();
            return supply === 0n ? 0n : mulDiv(balance, claimToken.tvl(), supply);
        }
        const value = trancheValue(bonds, asset, balance);
        if (value === null) {
            throw new UnexpectedAsset(`no valuation for ${asset}`);
        }
        return value;
    };
}
