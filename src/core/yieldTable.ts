/**
 * Yield Table — per bond class, per seniority yield factors
 *
 * A bond class is identified by its collateral token and tranche ratios,
 * so every bond the issuer mints with the same configuration shares one
 * row. Yields are fixed-point with YIELD_DECIMALS places.
 *
 * Once a class has been used to mint claims its row can be frozen, so that
 * outstanding claims keep the economic meaning they were minted under.
 */

import logger from '../utils/logger';
import { ONE_YIELD } from '../config/constants';
import { AssetId, BondBatch, BondRegistry } from '../types';
import { UnacceptableParams } from './errors';
import { Snapshottable } from '../state/atomic';

export interface YieldTableState {
    rows: Array<[string, bigint[]]>;
    used: string[];
}

export function classKeyOf(collateral: AssetId, trancheRatios: readonly number[]): string {
    return `${collateral}:${trancheRatios.join('-')}`;
}

export function bondClassKey(bond: Pick<BondBatch, 'collateral' | 'tranches'>): string {
    return classKeyOf(bond.collateral, bond.tranches.map((t) => t.ratio));
}

export class YieldTable implements Snapshottable<YieldTableState> {
    private rows = new Map<string, bigint[]>();
    private used = new Set<string>();

    constructor(
        private readonly registry: BondRegistry,
        private readonly freezeOnFirstUse: boolean
    ) {}

    updateDefinedYield(classKey: string, yields: bigint[]): void {
        if (yields.some((y) => y < 0n)) {
            throw new UnacceptableParams('yields must be non-negative', { classKey });
        }
        if (this.freezeOnFirstUse && this.used.has(classKey)) {
            throw new UnacceptableParams(`yield class ${classKey} already backs outstanding claims`, { classKey });
        }
        this.rows.set(classKey, [...yields]);
        logger.info(`[YIELD] class=${classKey} yields=[${yields.join(', ')}]`);
    }

    /**
     * Class key of a tranche's bond, or undefined for unknown assets.
     */
    trancheClass(asset: AssetId): string | undefined {
        const bond = this.registry.bondOfTranche(asset);
        return bond ? bondClassKey(bond) : undefined;
    }

    /**
     * Yield of `asset`. Raw collateral converts at 100%; unknown assets and
     * undefined rows yield zero.
     */
    trancheYield(asset: AssetId, collateral?: AssetId): bigint {
        if (collateral !== undefined && asset === collateral) {
            return ONE_YIELD;
        }
        const tranche = this.registry.trancheOf(asset);
        const bond = this.registry.bondOfTranche(asset);
        if (!tranche || !bond) {
            return 0n;
        }
        return this.rows.get(bondClassKey(bond))?.[tranche.seniority] ?? 0n;
    }

    markUsed(asset: AssetId): void {
        const classKey = this.trancheClass(asset);
        if (classKey !== undefined) {
            this.used.add(classKey);
        }
    }

    isFrozen(classKey: string): boolean {
        return this.freezeOnFirstUse && this.used.has(classKey);
    }

    snapshot(): YieldTableState {
        return {
            rows: Array.from(this.rows.entries()).map(([k, v]) => [k, [...v]]),
            used: Array.from(this.used),
        };
    }

    restore(state: YieldTableState): void {
        this.rows = new Map(state.rows.map(([k, v]) => [k, [...v]]));
        this.used = new Set(state.used);
    }
}
