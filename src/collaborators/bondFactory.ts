/**
 * Reference bond factory and controllers.
 *
 * Each bond locks collateral and mints seniority-ordered tranche tokens in
 * proportion to its ratios. Before maturity, tranche value follows a
 * seniority waterfall over the bond's collateral; at maturity the
 * collateral is split into per-tranche pots and tranches redeem pro rata.
 */

import logger from '../utils/logger';
import { FIXED_POINT } from '../config/constants';
import { AccountId, AssetId, BondBatch, BondId, BondRegistry, TokenAmount, TokenLedger, Tranche } from '../types';
import { ImmatureBond, UnacceptableParams, UnexpectedAsset } from '../core/errors';
import { Snapshottable } from '../state/atomic';
import { minBig, mulDiv } from '../utils/math';

export interface TrancheCollateralization {
    collateral: bigint;
    supply: bigint;
}

export interface BondFactoryState {
    bonds: BondBatch[];
    matured: BondId[];
    seq: number;
}

export const bondAccount = (bondId: BondId): AccountId => `bond:${bondId}`;
export const tranchePotAccount = (trancheId: AssetId): AccountId => `pot:${trancheId}`;

// ═══════════════════════════════════════════════════════════════════════════════
// CONTROLLER
// ═══════════════════════════════════════════════════════════════════════════════

export class BondController {
    constructor(
        public readonly bond: BondBatch,
        private readonly tokens: TokenLedger,
        private readonly isMatured: () => boolean,
        private readonly markMatured: () => void
    ) {}

    get matured(): boolean {
        return this.isMatured();
    }

    collateralBalance(): bigint {
        return this.tokens.balanceOf(this.bond.collateral, bondAccount(this.bond.id));
    }

    trancheSupply(index: number): bigint {
        return this.tokens.totalSupply(this.trancheAt(index).id);
    }

    /**
     * Locks `amount` collateral from `from` and mints every tranche to it.
     */
    deposit(from: AccountId, amount: bigint): TokenAmount[] {
        if (this.matured) {
            throw new UnacceptableParams(`bond ${this.bond.id} is mature, deposits closed`);
        }
        this.tokens.transfer(this.bond.collateral, from, bondAccount(this.bond.id), amount);
        return this.bond.tranches.map((t) => {
            const minted = mulDiv(amount, BigInt(t.ratio), BigInt(FIXED_POINT.TRANCHE_RATIO_GRANULARITY));
            this.tokens.mint(t.id, from, minted);
            return { asset: t.id, amount: minted };
        });
    }

    /**
     * Splits collateral into per-tranche pots once maturity is reached.
     * Returns false if the bond is not yet due.
     */
    mature(now: number): boolean {
        if (this.matured) {
            return true;
        }
        if (now < this.bond.maturity) {
            return false;
        }
        const allocations = this.bond.tranches.map((_, i) => this.getTrancheCollateralization(i).collateral);
        this.bond.tranches.forEach((t, i) => {
            this.tokens.transfer(this.bond.collateral, bondAccount(this.bond.id), tranchePotAccount(t.id), allocations[i]);
        });
        this.markMatured();
        logger.info(`[BOND] MATURE bond=${this.bond.id} collateral=[${allocations.join(', ')}]`);
        return true;
    }

    redeemMature(from: AccountId, trancheId: AssetId, amount: bigint, now: number): bigint {
        if (!this.mature(now)) {
            throw new ImmatureBond(`bond ${this.bond.id} matures at ${this.bond.maturity}`, { now });
        }
        const tranche = this.trancheOf(trancheId);
        const pot = this.tokens.balanceOf(this.bond.collateral, tranchePotAccount(tranche.id));
        const payout = mulDiv(amount, pot, this.tokens.totalSupply(tranche.id));
        this.tokens.burn(tranche.id, from, amount);
        this.tokens.transfer(this.bond.collateral, tranchePotAccount(tranche.id), from, payout);
        return payout;
    }

    /**
     * Pre-maturity redemption of a full tranche set held in exact ratio.
     */
    redeem(from: AccountId, amounts: bigint[], now: number): bigint {
        if (this.mature(now)) {
            throw new UnacceptableParams(`bond ${this.bond.id} is mature, use redeemMature`);
        }
        if (amounts.length !== this.bond.tranches.length) {
            throw new UnacceptableParams('expected one amount per tranche');
        }
        const units = this.bond.tranches.map((t, i) => amounts[i] * BigInt(FIXED_POINT.TRANCHE_RATIO_GRANULARITY) / BigInt(t.ratio));
        if (units.some((u, i) => u !== units[0] || amounts[i] * BigInt(FIXED_POINT.TRANCHE_RATIO_GRANULARITY) % BigInt(this.bond.tranches[i].ratio) !== 0n)) {
            throw new UnacceptableParams('tranche amounts not in bond ratio');
        }
        const payout = mulDiv(this.collateralBalance(), amounts[0], this.trancheSupply(0));
        this.bond.tranches.forEach((t, i) => this.tokens.burn(t.id, from, amounts[i]));
        this.tokens.transfer(this.bond.collateral, bondAccount(this.bond.id), from, payout);
        return payout;
    }

    /**
     * Largest ratio-aligned tranche set redeemable from the given balances.
     */
    computeRedeemableTrancheAmounts(balances: bigint[]): bigint[] {
        const granularity = BigInt(FIXED_POINT.TRANCHE_RATIO_GRANULARITY);
        const units = this.bond.tranches.reduce<bigint | null>((acc, t, i) => {
            const u = (balances[i] ?? 0n) * granularity / BigInt(t.ratio);
            return acc === null ? u : minBig(acc, u);
        }, null) ?? 0n;
        // Round down to a whole multiple so every amount is an integer
        const step = this.bond.tranches.reduce((acc, t) => lcm(acc, granularity / gcd(granularity, BigInt(t.ratio))), 1n);
        const aligned = units - (units % step);
        return this.bond.tranches.map((t) => aligned * BigInt(t.ratio) / granularity);
    }

    /**
     * Collateral backing tranche `index` and its supply. Pre-maturity this
     * is the seniority waterfall; the most junior tranche takes the rest.
     */
    getTrancheCollateralization(index: number): TrancheCollateralization {
        const tranche = this.trancheAt(index);
        const supply = this.tokens.totalSupply(tranche.id);
        if (this.matured) {
            return {
                collateral: this.tokens.balanceOf(this.bond.collateral, tranchePotAccount(tranche.id)),
                supply,
            };
        }
        let remaining = this.collateralBalance();
        const last = this.bond.tranches.length - 1;
        for (let i = 0; i < index; i++) {
            remaining -= minBig(this.trancheSupply(i), remaining);
        }
        return { collateral: index === last ? remaining : minBig(supply, remaining), supply };
    }

    trancheOf(trancheId: AssetId): Tranche {
        const tranche = this.bond.tranches.find((t) => t.id === trancheId);
        if (!tranche) {
            throw new UnexpectedAsset(`${trancheId} is not a tranche of ${this.bond.id}`);
        }
        return tranche;
    }

    private trancheAt(index: number): Tranche {
        const tranche = this.bond.tranches[index];
        if (!tranche) {
            throw new UnacceptableParams(`tranche index ${index} out of range for ${this.bond.id}`);
        }
        return tranche;
    }
}

function gcd(a: bigint, b: bigint): bigint {
    return b === 0n ? a : gcd(b, a % b);
}

function lcm(a: bigint, b: bigint): bigint {
    return (a / gcd(a, b)) * b;
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORY / REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export class BondFactory implements BondRegistry, Snapshottable<BondFactoryState> {
    private bonds = new Map<BondId, BondBatch>();
    private trancheIndex = new Map<AssetId, BondId>();
    private matured = new Set<BondId>();
    private seq = 0;

    constructor(private readonly tokens: TokenLedger) {}

    createBond(collateral: AssetId, trancheRatios: readonly number[], maturity: number, issuedAt: number): BondBatch {
        const total = trancheRatios.reduce((a, b) => a + b, 0);
        if (trancheRatios.length === 0 || trancheRatios.some((r) => r <= 0) || total !== FIXED_POINT.TRANCHE_RATIO_GRANULARITY) {
            throw new UnacceptableParams(`tranche ratios must be positive and sum to ${FIXED_POINT.TRANCHE_RATIO_GRANULARITY}`, {
                trancheRatios: [...trancheRatios],
            });
        }
        this.seq += 1;
        const id = `BOND-${this.seq}`;
        const bond: BondBatch = Object.freeze({
            id,
            collateral,
            maturity,
            issuedAt,
            tranches: Object.freeze(trancheRatios.map((ratio, seniority) => Object.freeze({
                id: `${id}-T${seniority}`,
                bondId: id,
                seniority,
                ratio,
            }))),
        });
        this.register(bond);
        return bond;
    }

    controller(bondId: BondId): BondController {
        const bond = this.bonds.get(bondId);
        if (!bond) {
            throw new UnexpectedAsset(`unknown bond ${bondId}`);
        }
        return new BondController(
            bond,
            this.tokens,
            () => this.matured.has(bondId),
            () => { this.matured.add(bondId); }
        );
    }

    getBond(bondId: BondId): BondBatch | undefined {
        return this.bonds.get(bondId);
    }

    bondOfTranche(asset: AssetId): BondBatch | undefined {
        const bondId = this.trancheIndex.get(asset);
        return bondId === undefined ? undefined : this.bonds.get(bondId);
    }

    trancheOf(asset: AssetId): Tranche | undefined {
        return this.bondOfTranche(asset)?.tranches.find((t) => t.id === asset);
    }

    snapshot(): BondFactoryState {
        return { bonds: Array.from(this.bonds.values()), matured: Array.from(this.matured), seq: this.seq };
    }

    restore(state: BondFactoryState): void {
        this.bonds = new Map();
        this.trancheIndex = new Map();
        state.bonds.forEach((b) => this.register(b));
        this.matured = new Set(state.matured);
        this.seq = state.seq;
    }

    private register(bond: BondBatch): void {
        this.bonds.set(bond.id, bond);
        bond.tranches.forEach((t) => this.trancheIndex.set(t.id, bond.id));
    }
}
