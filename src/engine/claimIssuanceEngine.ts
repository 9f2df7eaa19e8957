/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * CLAIM ISSUANCE ENGINE — PERPETUAL CLAIM TOKEN
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Mints, burns and rolls the perpetual claim token against a reserve of
 * bond tranches.
 *
 *   deposit       tranche of the minting bond  → claim tokens
 *   redeem        claim tokens → tranches, head of the queue first
 *   redeemIcebox  claim tokens → one off-queue asset, once the queue is empty
 *   rollover      fresh tranche in → older reserve asset out, no supply change
 *
 * Every public mutating operation runs inside the atomic executor: it sees
 * one clock reading, and either applies all of its effects or none.
 *
 * FEES: signed percentages of the claim amount, settled in claim tokens
 * between the caller and the reserve account. Positive → caller pays;
 * negative → reserve pays the caller.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { ONE_PRICE } from '../config/constants';
import {
    AccountId,
    AssetId,
    BondBatch,
    BondIssuer,
    FeePolicy,
    PricingSource,
    TokenAmount,
    TokenLedger,
    ValuationFn,
} from '../types';
import {
    UnacceptableDeposit,
    UnacceptableRedemption,
    UnacceptableRollover,
    UnexpectedAsset,
} from '../core/errors';
import { BondQueueManager, MaturityWindow } from '../core/bondQueue';
import { claimToTranches, isConvertible, tranchesToClaim } from '../core/conversion';
import { YieldTable } from '../core/yieldTable';
import { ReserveLedger } from '../capital/reserveLedger';
import { AtomicExecutor } from '../state/atomic';
import { BondFactory } from '../collaborators/bondFactory';
import { minBig, mulDiv, signedPerc } from '../utils/math';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface PerpetualClaimConfig {
    claimToken: AssetId;
    reserveAccount: AccountId;
    dustFloor: bigint;
    maturityWindow: MaturityWindow;
}

export interface PerpetualClaimDeps {
    tokens: TokenLedger;
    bonds: BondFactory;
    issuer: BondIssuer;
    feePolicy: FeePolicy;
    pricing: PricingSource;
    yields: YieldTable;
    executor: AtomicExecutor;
    clock: () => number;
    valuation: ValuationFn;
}

export interface DepositResult {
    claimMinted: bigint;
    fee: bigint;
}

export interface RedemptionResult {
    claimBurned: bigint;
    fee: bigint;
    payouts: TokenAmount[];
    remainder: bigint;
}

export interface RolloverResult {
    trancheInAmt: bigint;
    tokenOutAmt: bigint;
    claimEquivalent: bigint;
    fee: bigint;
}

const EMPTY_ROLLOVER: RolloverResult = { trancheInAmt: 0n, tokenOutAmt: 0n, claimEquivalent: 0n, fee: 0n };

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export class PerpetualClaim {
    readonly claimToken: AssetId;
    readonly reserveAccount: AccountId;
    readonly queue: BondQueueManager;
    readonly reserve: ReserveLedger;

    private readonly tokens: TokenLedger;
    private readonly bonds: BondFactory;
    private readonly yields: YieldTable;
    private readonly executor: AtomicExecutor;
    private readonly clock: () => number;
    private readonly valuation: ValuationFn;
    private issuer: BondIssuer;
    private feePolicy: FeePolicy;
    private pricing: PricingSource;

    constructor(config: PerpetualClaimConfig, deps: PerpetualClaimDeps) {
        this.claimToken = config.claimToken;
        this.reserveAccount = config.reserveAccount;
        this.tokens = deps.tokens;
        this.bonds = deps.bonds;
        this.issuer = deps.issuer;
        this.feePolicy = deps.feePolicy;
        this.pricing = deps.pricing;
        this.yields = deps.yields;
        this.executor = deps.executor;
        this.clock = deps.clock;
        this.valuation = deps.valuation;

        this.queue = new BondQueueManager(deps.issuer, config.maturityWindow);
        this.reserve = new ReserveLedger(deps.tokens, config.reserveAccount, config.dustFloor, '[PERP:RESERVE]');
        this.executor.register(this.queue);
        this.executor.register(this.reserve);
    }

    get collateral(): AssetId {
        return this.issuer.collateral;
    }

    get fees(): FeePolicy {
        return this.feePolicy;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // QUEUE
    // ═══════════════════════════════════════════════════════════════════════════

    getMintingBond(): BondBatch {
        return this.executor.run(this, 'getMintingBond', () => this.queue.getMintingBond(this.clock()));
    }

    getBurningBond(): BondBatch | null {
        return this.executor.run(this, 'getBurningBond', () => this.queue.getBurningBond(this.clock()));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DEPOSIT
    // ═══════════════════════════════════════════════════════════════════════════

    deposit(caller: AccountId, trancheIn: AssetId, amount: bigint): DepositResult {
        return this.executor.run(this, 'deposit', () => this.depositInternal(caller, trancheIn, amount, this.clock()));
    }

    private depositInternal(caller: AccountId, trancheIn: AssetId, amount: bigint, now: number): DepositResult {
        const mintingBond = this.queue.getMintingBond(now);
        const tranche = this.bonds.trancheOf(trancheIn);
        if (!tranche || tranche.bondId !== mintingBond.id) {
            throw new UnacceptableDeposit(`${trancheIn} is not a tranche of minting bond ${mintingBond.id}`, {
                trancheIn,
                mintingBond: mintingBond.id,
            });
        }

        const y = this.yields.trancheYield(trancheIn);
        const p = this.pricing.price(trancheIn);
        if (!isConvertible(y, p)) {
            throw new UnacceptableDeposit(`${trancheIn} has zero yield or price`, {
                yieldFactor: y.toString(),
                price: p.toString(),
            });
        }

        const claimAmt = tranchesToClaim(amount, y, p);
        if (claimAmt === 0n) {
            return { claimMinted: 0n, fee: 0n };
        }

        this.tokens.transfer(trancheIn, caller, this.reserveAccount, amount);
        this.reserve.syncAsset(trancheIn);
        this.tokens.mint(this.claimToken, caller, claimAmt);
        this.yields.markUsed(trancheIn);

        const fee = this.settleFee(caller, claimAmt, this.feePolicy.computePerpMintFeePerc());
        logger.info(`[PERP] DEPOSIT caller=${caller} tranche=${trancheIn} amount=${amount} minted=${claimAmt} fee=${fee}`);
        return { claimMinted: claimAmt, fee };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // REDEEM
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Burns claim tokens for tranches, walking the queue from the head.
     * A head bond whose convertible tranches are all drained is evicted and
     * the walk continues with the next head. The walk stops without eviction
     * when the remainder is too small to convert into any tranche of the head.
     */
    redeem(caller: AccountId, requestedAmt: bigint): RedemptionResult {
        return this.executor.run(this, 'redeem', () => this.redeemInternal(caller, requestedAmt, this.clock()));
    }

    private redeemInternal(caller: AccountId, requestedAmt: bigint, now: number): RedemptionResult {
        if (requestedAmt === 0n) {
            return { claimBurned: 0n, fee: 0n, payouts: [], remainder: 0n };
        }

        let remainder = requestedAmt;
        const payouts: TokenAmount[] = [];
        let bond = this.queue.getBurningBond(now);

        while (bond && remainder > 0n) {
            for (const tranche of bond.tranches) {
                if (remainder === 0n) {
                    break;
                }
                const taken = this.takeFromReserve(caller, tranche.id, remainder);
                if (taken) {
                    remainder = taken.remainder;
                    payouts.push({ asset: tranche.id, amount: taken.used });
                }
            }
            if (remainder === 0n) {
                break;
            }
            if (!this.isExhausted(bond)) {
                // Remainder converts to zero tranches of a still-funded head
                break;
            }
            this.queue.evict();
            bond = this.queue.getBurningBond(now);
        }

        return this.burnRedeemed(caller, requestedAmt, remainder, payouts, 'REDEEM');
    }

    /**
     * Redeems against a single reserve asset outside the queue. Only allowed
     * once queue redemption is no longer possible.
     */
    redeemIcebox(caller: AccountId, asset: AssetId, requestedAmt: bigint): RedemptionResult {
        return this.executor.run(this, 'redeemIcebox', () => {
            const now = this.clock();
            this.queue.getBurningBond(now);
            if (this.queue.length > 0) {
                throw new UnacceptableRedemption('icebox redemption requires an empty bond queue', {
                    queueLength: this.queue.length,
                });
            }
            if (!this.reserve.has(asset)) {
                throw new UnacceptableRedemption(`${asset} is not held in the reserve`, { asset });
            }
            if (requestedAmt === 0n) {
                return { claimBurned: 0n, fee: 0n, payouts: [], remainder: 0n };
            }

            if (!isConvertible(this.trancheYield(asset), this.pricing.price(asset))) {
                throw new UnacceptableRedemption(`${asset} has zero yield or price`, { asset });
            }
            const taken = this.takeFromReserve(caller, asset, requestedAmt);
            if (!taken) {
                // Request floors to zero tranches: nothing burnt
                return this.burnRedeemed(caller, requestedAmt, requestedAmt, [], 'REDEEM_ICEBOX');
            }
            const payouts = taken.used > 0n ? [{ asset, amount: taken.used }] : [];
            return this.burnRedeemed(caller, requestedAmt, taken.remainder, payouts, 'REDEEM_ICEBOX');
        });
    }

    /**
     * Pays out the tranche amount for `remainder` claims from the reserve,
     * capped at the reserve balance. Returns null for assets that cannot be
     * converted or are not held.
     */
    private takeFromReserve(
        caller: AccountId,
        asset: AssetId,
        remainder: bigint
    ): { used: bigint; remainder: bigint } | null {
        const y = this.trancheYield(asset);
        const p = this.pricing.price(asset);
        const balance = this.reserve.balanceOf(asset);
        if (!isConvertible(y, p) || balance === 0n) {
            return null;
        }

        const computed = claimToTranches(remainder, y, p);
        if (computed === 0n) {
            return null;
        }
        const used = minBig(computed, balance);
        const next = mulDiv(remainder, computed - used, computed);

        this.tokens.transfer(asset, this.reserveAccount, caller, used);
        this.reserve.syncAsset(asset);
        return { used, remainder: next };
    }

    /**
     * True once no convertible tranche of `bond` holds more than dust in the reserve.
     */
    private isExhausted(bond: BondBatch): boolean {
        return bond.tranches.every((tranche) => {
            const convertible = isConvertible(this.trancheYield(tranche.id), this.pricing.price(tranche.id));
            return !convertible || this.reserve.balanceOf(tranche.id) <= this.reserve.dustFloor;
        });
    }

    private burnRedeemed(
        caller: AccountId,
        requestedAmt: bigint,
        remainder: bigint,
        payouts: TokenAmount[],
        tag: string
    ): RedemptionResult {
        const burnt = requestedAmt - remainder;
        this.tokens.burn(this.claimToken, caller, burnt);
        const fee = this.settleFee(caller, burnt, this.feePolicy.computePerpBurnFeePerc());
        logger.info(
            `[PERP] ${tag} caller=${caller} requested=${requestedAmt} burnt=${burnt} remainder=${remainder} ` +
            `payouts=${payouts.map((t) => `${t.asset}:${t.amount}`).join(',') || 'none'} fee=${fee}`
        );
        return { claimBurned: burnt, fee, payouts, remainder };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ROLLOVER
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Swaps a tranche of the minting bond for a reserve asset outside the
     * queue at equal claim value. The output is capped at the reserve
     * balance; the tranche amount actually taken is re-derived from it.
     */
    rollover(caller: AccountId, trancheIn: AssetId, tokenOut: AssetId, trancheInAmt: bigint): RolloverResult {
        return this.executor.run(this, 'rollover', () =>
            this.rolloverInternal(caller, trancheIn, tokenOut, trancheInAmt, this.clock())
        );
    }

    private rolloverInternal(
        caller: AccountId,
        trancheIn: AssetId,
        tokenOut: AssetId,
        trancheInAmt: bigint,
        now: number
    ): RolloverResult {
        this.queue.getBurningBond(now);
        const mintingBond = this.queue.getMintingBond(now);

        const inTranche = this.bonds.trancheOf(trancheIn);
        if (!inTranche || inTranche.bondId !== mintingBond.id) {
            throw new UnacceptableRollover(`${trancheIn} is not a tranche of minting bond ${mintingBond.id}`, {
                trancheIn,
            });
        }
        if (!this.reserve.has(tokenOut)) {
            throw new UnacceptableRollover(`${tokenOut} is not held in the reserve`, { tokenOut });
        }
        const outBond = this.bonds.bondOfTranche(tokenOut);
        if (outBond && this.queue.contains(outBond.id)) {
            throw new UnacceptableRollover(`${tokenOut} belongs to queued bond ${outBond.id}`, { tokenOut });
        }

        const yIn = this.yields.trancheYield(trancheIn);
        const pIn = this.pricing.price(trancheIn);
        const yOut = this.trancheYield(tokenOut);
        const pOut = this.pricing.price(tokenOut);
        if (!isConvertible(yIn, pIn) || !isConvertible(yOut, pOut)) {
            throw new UnacceptableRollover('rollover assets must have non-zero yield and price', { trancheIn, tokenOut });
        }
        if (trancheInAmt === 0n) {
            return { ...EMPTY_ROLLOVER };
        }

        let inAmt = trancheInAmt;
        let claimEquivalent = tranchesToClaim(inAmt, yIn, pIn);
        let outAmt = claimToTranches(claimEquivalent, yOut, pOut);

        const outBalance = this.reserve.balanceOf(tokenOut);
        if (outAmt > outBalance) {
            outAmt = outBalance;
            claimEquivalent = tranchesToClaim(outAmt, yOut, pOut);
            inAmt = minBig(claimToTranches(claimEquivalent, yIn, pIn), trancheInAmt);
        }
        if (claimEquivalent === 0n || outAmt === 0n) {
            return { ...EMPTY_ROLLOVER };
        }

        this.tokens.transfer(trancheIn, caller, this.reserveAccount, inAmt);
        this.tokens.transfer(tokenOut, this.reserveAccount, caller, outAmt);
        this.reserve.syncAsset(trancheIn);
        this.reserve.syncAsset(tokenOut);
        this.yields.markUsed(trancheIn);

        const fee = this.settleFee(caller, claimEquivalent, this.feePolicy.computePerpRolloverFeePerc(claimEquivalent));
        logger.info(
            `[PERP] ROLLOVER caller=${caller} in=${trancheIn}:${inAmt} out=${tokenOut}:${outAmt} ` +
            `claimEquivalent=${claimEquivalent} fee=${fee}`
        );
        return { trancheInAmt: inAmt, tokenOutAmt: outAmt, claimEquivalent, fee };
    }

    /**
     * Reserve assets that rollovers may take out: the collateral first,
     * then tranches of bonds outside the queue by increasing maturity.
     */
    getRolloverTargets(): AssetId[] {
        const now = this.clock();
        const targets = this.reserve.assets().filter((asset) => {
            const bond = this.bonds.bondOfTranche(asset);
            if (!bond) {
                return asset === this.collateral;
            }
            return !(this.queue.contains(bond.id) && this.queue.isAdmissible(bond, now));
        });
        const maturityOf = (asset: AssetId): number => this.bonds.bondOfTranche(asset)?.maturity ?? 0;
        return targets.sort((a, b) => maturityOf(a) - maturityOf(b));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MATURED TRANCHES
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Redeems every reserve tranche whose bond has matured into collateral.
     */
    redeemMatureTranches(): TokenAmount[] {
        return this.executor.run(this, 'redeemMatureTranches', () => {
            const now = this.clock();
            this.queue.getBurningBond(now);
            const redeemed: TokenAmount[] = [];
            for (const asset of this.reserve.assets()) {
                const bond = this.bonds.bondOfTranche(asset);
                if (!bond || now < bond.maturity) {
                    continue;
                }
                const amount = this.reserve.balanceOf(asset);
                const payout = this.bonds.controller(bond.id).redeemMature(this.reserveAccount, asset, amount, now);
                this.reserve.syncAsset(asset);
                this.reserve.syncAsset(bond.collateral);
                redeemed.push({ asset, amount });
                logger.info(`[PERP] MATURE_REDEEM tranche=${asset} amount=${amount} collateral=${payout}`);
            }
            return redeemed;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VALUATION / VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getTVL(): bigint {
        return this.reserve.aggregateValue(this.valuation);
    }

    totalSupply(): bigint {
        return this.tokens.totalSupply(this.claimToken);
    }

    /**
     * Claim price in collateral, PRICE_DECIMALS places. Unit price while
     * no claims are outstanding.
     */
    computePrice(): bigint {
        const supply = this.totalSupply();
        return supply === 0n ? ONE_PRICE : mulDiv(this.getTVL(), ONE_PRICE, supply);
    }

    getReserveCount(): number {
        return this.reserve.count;
    }

    getReserveAt(index: number): AssetId {
        return this.reserve.at(index);
    }

    inReserve(asset: AssetId): boolean {
        return this.reserve.has(asset);
    }

    trancheClass(asset: AssetId): string | undefined {
        return this.yields.trancheClass(asset);
    }

    /**
     * Yield of any reserve asset; the raw collateral converts at 100%.
     */
    trancheYield(asset: AssetId): bigint {
        return this.yields.trancheYield(asset, this.collateral);
    }

    trancheValue(asset: AssetId, amount: bigint): bigint {
        const y = this.trancheYield(asset);
        const p = this.pricing.price(asset);
        return isConvertible(y, p) ? tranchesToClaim(amount, y, p) : 0n;
    }

    price(asset: AssetId): bigint {
        return this.pricing.price(asset);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ADMIN
    // ═══════════════════════════════════════════════════════════════════════════

    updateDefinedYield(classKey: string, yields: bigint[]): void {
        this.yields.updateDefinedYield(classKey, yields);
    }

    updateTolerableTrancheMaturity(minMaturitySec: number, maxMaturitySec: number): void {
        this.queue.updateTolerableMaturity({ minMaturitySec, maxMaturitySec });
    }

    updateBondIssuer(issuer: BondIssuer): void {
        if (issuer.collateral !== this.issuer.collateral) {
            throw new UnexpectedAsset(`issuer collateral ${issuer.collateral} differs from ${this.issuer.collateral}`);
        }
        this.issuer = issuer;
        this.queue.setIssuer(issuer);
        logger.info('[PERP] bond issuer updated');
    }

    updateFeePolicy(feePolicy: FeePolicy): void {
        this.feePolicy = feePolicy;
        logger.info('[PERP] fee policy updated');
    }

    updatePricingSource(pricing: PricingSource): void {
        this.pricing = pricing;
        logger.info('[PERP] pricing source updated');
    }

    /**
     * Sweeps a stray token balance out of the reserve account. Assets that
     * back outstanding claims cannot be moved this way.
     */
    transferERC20(asset: AssetId, to: AccountId, amount: bigint): void {
        this.executor.run(this, 'transferERC20', () => {
            if (this.reserve.has(asset) || asset === this.collateral) {
                throw new UnexpectedAsset(`${asset} is a reserve asset`, { asset });
            }
            this.tokens.transfer(asset, this.reserveAccount, to, amount);
            logger.info(`[PERP] SWEEP asset=${asset} to=${to} amount=${amount}`);
        });
    }

    private settleFee(caller: AccountId, claimAmt: bigint, perc: bigint): bigint {
        const fee = signedPerc(claimAmt, perc, this.feePolicy.decimals());
        if (fee > 0n) {
            this.tokens.transfer(this.claimToken, caller, this.reserveAccount, fee);
        } else if (fee < 0n) {
            this.tokens.transfer(this.claimToken, this.reserveAccount, caller, -fee);
        }
        return fee;
    }
}
