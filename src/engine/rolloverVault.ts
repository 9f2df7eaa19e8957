/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * ROLLOVER VAULT — TRANCHES RAW COLLATERAL, ROLLS IT INTO THE CLAIM RESERVE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Holds underlying collateral for share holders and keeps it working:
 *
 *   deploy()   tranche usable underlying via the minting bond, then roll the
 *              accepted tranches into the claim engine for older reserve assets
 *   recover()  redeem matured tranches; meld complete immature tranche sets
 *
 * PHASES: idle → deploying → idle, idle → recovering → idle. A phase never
 * overlaps another one; recoverAndRedeploy() runs both back to back inside
 * one atomic unit.
 *
 * SWAPS: the vault is the counterparty for underlying ↔ claim token swaps
 * and must stay within its configured liquidity bounds (underlying share
 * of vault TVL) after every swap.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { FIXED_POINT, ONE_PERC, ONE_PRICE } from '../config/constants';
import { AccountId, AssetId, BondBatch, BondId, FeePolicy, TokenAmount, TokenLedger, Tranche, ValuationFn } from '../types';
import {
    DeployedCountOverLimit,
    InsufficientDeployment,
    LiquidityOutOfBounds,
    ReentrantCall,
    UnacceptableDeposit,
    UnacceptableParams,
    UnexpectedAsset,
} from '../core/errors';
import { claimToTranches, isConvertible } from '../core/conversion';
import { ReserveLedger } from '../capital/reserveLedger';
import { AtomicExecutor } from '../state/atomic';
import { BondFactory } from '../collaborators/bondFactory';
import { createValuation } from '../collaborators/valuation';
import { PerpetualClaim, RolloverResult } from './claimIssuanceEngine';
import { FeeTerms, MintQuote, RedemptionQuote, computeMintAmt, computeRedemptionAmts } from './vaultNav';
import { formatFixedPt, maxBig, mulDiv, mulDivUp, signedPerc } from '../utils/math';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type VaultPhase = 'idle' | 'deploying' | 'recovering';

export interface RolloverVaultConfig {
    underlying: AssetId;
    vaultAccount: AccountId;
    shareToken: AssetId;
    dustFloor: bigint;
    minDeploymentAmt: bigint;
    reservedUnderlyingBal: bigint;
    reservedUnderlyingPerc: bigint;
    maxDeployedCount: number;
    minUnderlyingPerc: bigint;
    maxUnderlyingPerc: bigint;
}

export interface RolloverVaultDeps {
    tokens: TokenLedger;
    bonds: BondFactory;
    perp: PerpetualClaim;
    feePolicy: FeePolicy;
    executor: AtomicExecutor;
    clock: () => number;
}

export interface DeployResult {
    bondId: BondId;
    deployedAmt: bigint;
    minted: TokenAmount[];
    rollovers: Array<RolloverResult & { trancheIn: AssetId; tokenOut: AssetId }>;
}

export interface SwapResult {
    amountOut: bigint;
    fee: bigint;
}

export type DeploymentParams = Pick<
    RolloverVaultConfig,
    'minDeploymentAmt' | 'reservedUnderlyingBal' | 'reservedUnderlyingPerc' | 'maxDeployedCount'
>;

export type LiquidityBounds = Pick<RolloverVaultConfig, 'minUnderlyingPerc' | 'maxUnderlyingPerc'>;

// ═══════════════════════════════════════════════════════════════════════════════
// VAULT
// ═══════════════════════════════════════════════════════════════════════════════

export class RolloverVault {
    readonly underlying: AssetId;
    readonly vaultAccount: AccountId;
    readonly shareToken: AssetId;
    readonly ledger: ReserveLedger;

    private deployment: DeploymentParams;
    private bounds: LiquidityBounds;
    private feePolicy: FeePolicy;
    private phaseState: VaultPhase = 'idle';

    private readonly tokens: TokenLedger;
    private readonly bonds: BondFactory;
    private readonly perp: PerpetualClaim;
    private readonly executor: AtomicExecutor;
    private readonly clock: () => number;
    private readonly valuation: ValuationFn;

    constructor(config: RolloverVaultConfig, deps: RolloverVaultDeps) {
        if (deps.perp.collateral !== config.underlying) {
            throw new UnacceptableParams('vault underlying must be the claim collateral', {
                underlying: config.underlying,
                collateral: deps.perp.collateral,
            });
        }
        this.underlying = config.underlying;
        this.vaultAccount = config.vaultAccount;
        this.shareToken = config.shareToken;
        this.deployment = RolloverVault.checkDeployment(config);
        this.bounds = RolloverVault.checkBounds(config);
        this.tokens = deps.tokens;
        this.bonds = deps.bonds;
        this.perp = deps.perp;
        this.feePolicy = deps.feePolicy;
        this.executor = deps.executor;
        this.clock = deps.clock;

        this.ledger = new ReserveLedger(deps.tokens, config.vaultAccount, config.dustFloor, '[VAULT:RESERVE]');
        this.executor.register(this.ledger);

        const perp = deps.perp;
        this.valuation = createValuation({
            collateral: config.underlying,
            bonds: deps.bonds,
            claimToken: {
                asset: perp.claimToken,
                tvl: () => perp.getTVL(),
                supply: () => perp.totalSupply(),
            },
        });
    }

    private static checkDeployment(params: DeploymentParams): DeploymentParams {
        if (params.reservedUnderlyingPerc < 0n || params.reservedUnderlyingPerc > ONE_PERC) {
            throw new UnacceptableParams('reserved underlying percentage out of range');
        }
        if (params.minDeploymentAmt < 0n || params.reservedUnderlyingBal < 0n || params.maxDeployedCount < 0) {
            throw new UnacceptableParams('deployment parameters must be non-negative');
        }
        const { minDeploymentAmt, reservedUnderlyingBal, reservedUnderlyingPerc, maxDeployedCount } = params;
        return { minDeploymentAmt, reservedUnderlyingBal, reservedUnderlyingPerc, maxDeployedCount };
    }

    private static checkBounds(bounds: LiquidityBounds): LiquidityBounds {
        const { minUnderlyingPerc, maxUnderlyingPerc } = bounds;
        if (minUnderlyingPerc < 0n || maxUnderlyingPerc > ONE_PERC || minUnderlyingPerc > maxUnderlyingPerc) {
            throw new UnacceptableParams('invalid liquidity bounds', {
                minUnderlyingPerc: minUnderlyingPerc.toString(),
                maxUnderlyingPerc: maxUnderlyingPerc.toString(),
            });
        }
        return { minUnderlyingPerc, maxUnderlyingPerc };
    }

    get phase(): VaultPhase {
        return this.phaseState;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ROLLOVER AUTOMATON
    // ═══════════════════════════════════════════════════════════════════════════

    deploy(): DeployResult {
        return this.executor.run(this, 'deploy', () => this.inPhase('deploying', () => this.deployInternal()));
    }

    recover(asset?: AssetId): bigint {
        return this.executor.run(this, 'recover', () =>
            this.inPhase('recovering', () => (asset === undefined ? this.recoverAll() : this.recoverAsset(asset)))
        );
    }

    recoverAndRedeploy(): DeployResult {
        return this.executor.run(this, 'recoverAndRedeploy', () => {
            this.inPhase('recovering', () => this.recoverAll());
            return this.inPhase('deploying', () => this.deployInternal());
        });
    }

    private inPhase<T>(phase: Exclude<VaultPhase, 'idle'>, fn: () => T): T {
        if (this.phaseState !== 'idle') {
            throw new ReentrantCall(`vault cannot enter ${phase} while ${this.phaseState}`);
        }
        this.phaseState = phase;
        try {
            return fn();
        } finally {
            this.phaseState = 'idle';
        }
    }

    /**
     * Underlying above the reserved floor. The floor is the larger of the
     * absolute reserve and the percentage reserve.
     */
    usableUnderlying(): bigint {
        const balance = this.tokens.balanceOf(this.underlying, this.vaultAccount);
        const reserved = maxBig(
            this.deployment.reservedUnderlyingBal,
            mulDiv(balance, this.deployment.reservedUnderlyingPerc, ONE_PERC)
        );
        return balance > reserved ? balance - reserved : 0n;
    }

    private deployInternal(): DeployResult {
        const usable = this.usableUnderlying();
        if (usable === 0n || usable < this.deployment.minDeploymentAmt) {
            throw new InsufficientDeployment(`usable underlying ${usable} below minimum`, {
                usable: usable.toString(),
                minDeploymentAmt: this.deployment.minDeploymentAmt.toString(),
            });
        }

        const bond = this.perp.getMintingBond();
        const minted = this.bonds.controller(bond.id).deposit(this.vaultAccount, usable);
        this.ledger.syncAsset(this.underlying);
        minted.forEach((t) => this.ledger.syncAsset(t.asset));

        const accepted = bond.tranches.filter((t) =>
            isConvertible(this.perp.trancheYield(t.id), this.perp.price(t.id))
        );
        if (accepted.length === 0) {
            throw new InsufficientDeployment(`no tranche of ${bond.id} is accepted by the claim reserve`, {
                bondId: bond.id,
            });
        }

        const rollovers: DeployResult['rollovers'] = [];
        for (const tranche of accepted) {
            for (const target of this.perp.getRolloverTargets()) {
                const remaining = this.tokens.balanceOf(tranche.id, this.vaultAccount);
                if (remaining === 0n) {
                    break;
                }
                const result = this.perp.rollover(this.vaultAccount, tranche.id, target, remaining);
                this.ledger.syncAsset(tranche.id);
                this.ledger.syncAsset(target);
                if (result.tokenOutAmt > 0n) {
                    rollovers.push({ ...result, trancheIn: tranche.id, tokenOut: target });
                }
            }
        }

        const deployedCount = this.deployedAssets().length;
        if (deployedCount > this.deployment.maxDeployedCount) {
            throw new DeployedCountOverLimit(`vault would track ${deployedCount} deployed assets`, {
                deployedCount,
                maxDeployedCount: this.deployment.maxDeployedCount,
            });
        }

        logger.info(
            `[VAULT] DEPLOY bond=${bond.id} amount=${usable} rollovers=${rollovers.length} deployed=${deployedCount}`
        );
        return { bondId: bond.id, deployedAmt: usable, minted, rollovers };
    }

    private recoverAll(): bigint {
        const handled = new Set<BondId>();
        let recovered = 0n;
        for (const asset of this.ledger.assets()) {
            const tranche = this.bonds.trancheOf(asset);
            if (!tranche || handled.has(tranche.bondId)) {
                continue;
            }
            handled.add(tranche.bondId);
            recovered += this.recoverBond(tranche.bondId);
        }
        logger.info(`[VAULT] RECOVER bonds=${handled.size} underlying=${recovered}`);
        return recovered;
    }

    private recoverAsset(asset: AssetId): bigint {
        const tranche = this.bonds.trancheOf(asset);
        if (!tranche || !this.ledger.has(asset)) {
            throw new UnexpectedAsset(`${asset} is not a deployed tranche`, { asset });
        }
        const recovered = this.recoverBond(tranche.bondId);
        logger.info(`[VAULT] RECOVER asset=${asset} underlying=${recovered}`);
        return recovered;
    }

    /**
     * Matured bond: redeem every held tranche. Immature bond: redeem the
     * largest complete tranche set held, in bond ratio.
     */
    private recoverBond(bondId: BondId): bigint {
        const now = this.clock();
        const controller = this.bonds.controller(bondId);
        const bond = controller.bond;
        const before = this.tokens.balanceOf(this.underlying, this.vaultAccount);

        if (controller.mature(now)) {
            for (const tranche of bond.tranches) {
                const balance = this.tokens.balanceOf(tranche.id, this.vaultAccount);
                if (balance > 0n) {
                    controller.redeemMature(this.vaultAccount, tranche.id, balance, now);
                }
            }
        } else {
            const balances = bond.tranches.map((t) => this.tokens.balanceOf(t.id, this.vaultAccount));
            const amounts = controller.computeRedeemableTrancheAmounts(balances);
            if (amounts.every((a) => a > 0n)) {
                controller.redeem(this.vaultAccount, amounts, now);
            }
        }

        bond.tranches.forEach((t) => this.ledger.syncAsset(t.id));
        this.ledger.syncAsset(this.underlying);
        return this.tokens.balanceOf(this.underlying, this.vaultAccount) - before;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // NAV: DEPOSIT / REDEEM
    // ═══════════════════════════════════════════════════════════════════════════

    getTVL(): bigint {
        return this.ledger.aggregateValue(this.valuation);
    }

    totalShares(): bigint {
        return this.tokens.totalSupply(this.shareToken);
    }

    computeMintAmt(underlyingAmt: bigint): MintQuote {
        return computeMintAmt(underlyingAmt, this.totalShares(), this.getTVL(), this.feeTerms(this.feePolicy.computeVaultMintFeePerc()));
    }

    computeRedemptionAmts(shareAmt: bigint): RedemptionQuote {
        return computeRedemptionAmts(
            this.ledger.entries(),
            shareAmt,
            this.totalShares(),
            this.feeTerms(this.feePolicy.computeVaultBurnFeePerc())
        );
    }

    deposit(caller: AccountId, amount: bigint): MintQuote {
        return this.executor.run(this, 'vaultDeposit', () => {
            const quote = this.computeMintAmt(amount);
            if (amount === 0n) {
                return quote;
            }
            this.tokens.transfer(this.underlying, caller, this.vaultAccount, amount);
            this.ledger.syncAsset(this.underlying);
            this.tokens.mint(this.shareToken, caller, quote.shares);
            logger.info(`[VAULT] DEPOSIT caller=${caller} amount=${amount} shares=${quote.shares} fee=${quote.fee}`);
            return quote;
        });
    }

    redeem(caller: AccountId, shareAmt: bigint): RedemptionQuote {
        return this.executor.run(this, 'vaultRedeem', () => {
            const quote = this.computeRedemptionAmts(shareAmt);
            if (shareAmt === 0n) {
                return quote;
            }
            this.tokens.burn(this.shareToken, caller, shareAmt);
            for (const { asset, amount } of quote.payouts) {
                this.tokens.transfer(asset, this.vaultAccount, caller, amount);
                this.ledger.syncAsset(asset);
            }
            logger.info(
                `[VAULT] REDEEM caller=${caller} shares=${shareAmt} ` +
                `payouts=${quote.payouts.map((t) => `${t.asset}:${t.amount}`).join(',') || 'none'}`
            );
            return quote;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SWAPS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Sells claim tokens for underlying at the claim price, net of the swap
     * fee. The vault tranches enough underlying to deposit the senior tranche
     * for exactly the claims it pays out; the junior stays in the vault.
     */
    swapUnderlyingForPerps(caller: AccountId, amount: bigint): SwapResult {
        return this.executor.run(this, 'swapUnderlyingForPerps', () => {
            if (amount === 0n) {
                return { amountOut: 0n, fee: 0n };
            }
            const fee = signedPerc(amount, this.feePolicy.computeUnderlyingToPerpSwapFeePerc(), this.feePolicy.decimals());
            const claimTarget = mulDiv(amount - fee, ONE_PRICE, this.perp.computePrice());

            this.tokens.transfer(this.underlying, caller, this.vaultAccount, amount);
            this.ledger.syncAsset(this.underlying);

            const bond = this.perp.getMintingBond();
            const senior = this.seniorTranche(bond);
            const seniorNeeded = claimToTranches(claimTarget, this.perp.trancheYield(senior.id), this.perp.price(senior.id));
            const underlyingNeeded = mulDivUp(
                seniorNeeded,
                BigInt(FIXED_POINT.TRANCHE_RATIO_GRANULARITY),
                BigInt(senior.ratio)
            );
            const available = this.tokens.balanceOf(this.underlying, this.vaultAccount);
            if (underlyingNeeded > available) {
                throw new LiquidityOutOfBounds(`vault holds ${available} underlying, swap needs ${underlyingNeeded}`, {
                    available: available.toString(),
                    underlyingNeeded: underlyingNeeded.toString(),
                });
            }

            const minted = this.bonds.controller(bond.id).deposit(this.vaultAccount, underlyingNeeded);
            this.ledger.syncAsset(this.underlying);
            minted.forEach((t) => this.ledger.syncAsset(t.asset));

            const claimBefore = this.tokens.balanceOf(this.perp.claimToken, this.vaultAccount);
            this.perp.deposit(this.vaultAccount, senior.id, seniorNeeded);
            this.ledger.syncAsset(senior.id);
            const claimOut = this.tokens.balanceOf(this.perp.claimToken, this.vaultAccount) - claimBefore;
            this.tokens.transfer(this.perp.claimToken, this.vaultAccount, caller, claimOut);
            this.ledger.syncAsset(this.perp.claimToken);

            this.assertLiquidity();
            logger.info(`[VAULT] SWAP underlying→claim caller=${caller} in=${amount} out=${claimOut} fee=${fee}`);
            return { amountOut: claimOut, fee };
        });
    }

    /**
     * Buys claim tokens for underlying at the claim price, net of the swap
     * fee. The claims are redeemed through the claim engine and whatever
     * can be recovered immediately is turned back into underlying.
     */
    swapPerpsForUnderlying(caller: AccountId, claimAmt: bigint): SwapResult {
        return this.executor.run(this, 'swapPerpsForUnderlying', () => {
            if (claimAmt === 0n) {
                return { amountOut: 0n, fee: 0n };
            }
            const value = mulDiv(claimAmt, this.perp.computePrice(), ONE_PRICE);
            const fee = signedPerc(value, this.feePolicy.computePerpToUnderlyingSwapFeePerc(), this.feePolicy.decimals());
            const underlyingOut = value - fee;

            this.tokens.transfer(this.perp.claimToken, caller, this.vaultAccount, claimAmt);

            // Keep back what the claim engine charges on the burn
            const perpFees = this.perp.fees;
            const burnFee = signedPerc(claimAmt, perpFees.computePerpBurnFeePerc(), perpFees.decimals());
            const redemption = this.perp.redeem(this.vaultAccount, burnFee > 0n ? claimAmt - burnFee : claimAmt);
            this.ledger.syncAsset(this.perp.claimToken);
            redemption.payouts.forEach((t) => this.ledger.syncAsset(t.asset));

            const bondIds = new Set(
                redemption.payouts.map((t) => this.bonds.trancheOf(t.asset)?.bondId).filter((id): id is BondId => id !== undefined)
            );
            bondIds.forEach((bondId) => this.recoverBond(bondId));

            const available = this.tokens.balanceOf(this.underlying, this.vaultAccount);
            if (underlyingOut > available) {
                throw new LiquidityOutOfBounds(`vault holds ${available} underlying, swap pays ${underlyingOut}`, {
                    available: available.toString(),
                    underlyingOut: underlyingOut.toString(),
                });
            }
            this.tokens.transfer(this.underlying, this.vaultAccount, caller, underlyingOut);
            this.ledger.syncAsset(this.underlying);

            this.assertLiquidity();
            logger.info(`[VAULT] SWAP claim→underlying caller=${caller} in=${claimAmt} out=${underlyingOut} fee=${fee}`);
            return { amountOut: underlyingOut, fee };
        });
    }

    /**
     * Underlying share of vault TVL, PERC_DECIMALS places.
     */
    underlyingPerc(): bigint {
        const tvl = this.getTVL();
        const balance = this.tokens.balanceOf(this.underlying, this.vaultAccount);
        return tvl === 0n ? 0n : mulDiv(balance, ONE_PERC, tvl);
    }

    private assertLiquidity(): void {
        if (this.getTVL() === 0n) {
            return;
        }
        const perc = this.underlyingPerc();
        if (perc < this.bounds.minUnderlyingPerc || perc > this.bounds.maxUnderlyingPerc) {
            throw new LiquidityOutOfBounds(
                `underlying at ${formatFixedPt(perc * 100n, FIXED_POINT.PERC_DECIMALS)}% of vault TVL`,
                {
                    perc: perc.toString(),
                    minUnderlyingPerc: this.bounds.minUnderlyingPerc.toString(),
                    maxUnderlyingPerc: this.bounds.maxUnderlyingPerc.toString(),
                }
            );
        }
    }

    private seniorTranche(bond: BondBatch): Tranche {
        const senior = bond.tranches[0];
        if (!senior || !isConvertible(this.perp.trancheYield(senior.id), this.perp.price(senior.id))) {
            throw new UnacceptableDeposit(`senior tranche of ${bond.id} is not accepted by the claim reserve`, {
                bondId: bond.id,
            });
        }
        return senior;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS / ADMIN
    // ═══════════════════════════════════════════════════════════════════════════

    deployedAssets(): AssetId[] {
        return this.ledger.assets().filter((a) => a !== this.underlying);
    }

    updateDeploymentParams(patch: Partial<DeploymentParams>): void {
        this.deployment = RolloverVault.checkDeployment({ ...this.deployment, ...patch });
        logger.info(`[VAULT] deployment params updated maxDeployedCount=${this.deployment.maxDeployedCount}`);
    }

    updateLiquidityBounds(bounds: LiquidityBounds): void {
        this.bounds = RolloverVault.checkBounds(bounds);
    }

    updateFeePolicy(feePolicy: FeePolicy): void {
        this.feePolicy = feePolicy;
    }

    private feeTerms(perc: bigint): FeeTerms {
        return { perc, decimals: this.feePolicy.decimals() };
    }
}
