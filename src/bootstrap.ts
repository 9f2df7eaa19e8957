/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP — COMPOSITION ROOT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Wires the token book, bond factory, issuer, yield table, claim engine and
 * vault around ONE atomic executor. NO RUNTIME LOOPS in this file; the
 * keeper in start.ts drives the system.
 *
 * RULES:
 * 1. Every stateful component is registered with the executor exactly once
 *    (the engines register their own queue/reserve state)
 * 2. The yield class of the configured issuer is defined before first use
 * 3. All components share one clock
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from './utils/logger';
import { ACCOUNTS, ASSETS } from './config/constants';
import { LedgerConfig } from './config';
import { FeePolicy, PricingSource } from './types';
import { AtomicExecutor } from './state/atomic';
import { TokenBook } from './capital/tokenBook';
import { YieldTable, classKeyOf } from './core/yieldTable';
import { BondFactory } from './collaborators/bondFactory';
import { InMemoryBondIssuer } from './collaborators/bondIssuer';
import { StaticFeePolicy } from './collaborators/feePolicy';
import { TablePricingSource } from './collaborators/pricing';
import { createValuation } from './collaborators/valuation';
import { PerpetualClaim } from './engine/claimIssuanceEngine';
import { RolloverVault } from './engine/rolloverVault';

export interface LedgerSystem {
    config: LedgerConfig;
    clock: () => number;
    executor: AtomicExecutor;
    tokens: TokenBook;
    bonds: BondFactory;
    issuer: InMemoryBondIssuer;
    yields: YieldTable;
    perp: PerpetualClaim;
    vault: RolloverVault;
}

export interface SystemOverrides {
    clock?: () => number;
    feePolicy?: FeePolicy;
    pricing?: PricingSource;
}

export const systemClock = (): number => Math.floor(Date.now() / 1000);

export function createSystem(config: LedgerConfig, overrides: SystemOverrides = {}): LedgerSystem {
    const clock = overrides.clock ?? systemClock;
    const feePolicy = overrides.feePolicy ?? new StaticFeePolicy();
    const pricing = overrides.pricing ?? new TablePricingSource();

    const executor = new AtomicExecutor();
    const tokens = new TokenBook();
    const bonds = new BondFactory(tokens);
    const issuer = new InMemoryBondIssuer(bonds, {
        collateral: config.underlying,
        maxMaturityDuration: config.bondDurationSec,
        minIssueTimeIntervalSec: config.issueIntervalSec,
        issueWindowOffsetSec: config.issueWindowOffsetSec,
        trancheRatios: config.trancheRatios,
    });
    const yields = new YieldTable(bonds, config.freezeYieldOnFirstUse);

    executor.register(tokens);
    executor.register(bonds);
    executor.register(issuer);
    executor.register(yields);

    yields.updateDefinedYield(classKeyOf(config.underlying, config.trancheRatios), config.definedYields);

    const perp = new PerpetualClaim(
        {
            claimToken: ASSETS.CLAIM_TOKEN,
            reserveAccount: ACCOUNTS.PERP_RESERVE,
            dustFloor: config.dustFloor,
            maturityWindow: { minMaturitySec: config.minMaturitySec, maxMaturitySec: config.maxMaturitySec },
        },
        {
            tokens,
            bonds,
            issuer,
            feePolicy,
            pricing,
            yields,
            executor,
            clock,
            valuation: createValuation({ collateral: config.underlying, bonds }),
        }
    );

    const vault = new RolloverVault(
        {
            underlying: config.underlying,
            vaultAccount: ACCOUNTS.VAULT,
            shareToken: ASSETS.VAULT_SHARE,
            dustFloor: config.dustFloor,
            minDeploymentAmt: config.minDeploymentAmt,
            reservedUnderlyingBal: config.reservedUnderlyingBal,
            reservedUnderlyingPerc: config.reservedUnderlyingPerc,
            maxDeployedCount: config.maxDeployedCount,
            minUnderlyingPerc: config.minUnderlyingPerc,
            maxUnderlyingPerc: config.maxUnderlyingPerc,
        },
        { tokens, bonds, perp, feePolicy, executor, clock }
    );

    logger.info(
        `[BOOTSTRAP] underlying=${config.underlying} ratios=${config.trancheRatios.join('/')} ` +
        `window=${config.minMaturitySec}-${config.maxMaturitySec}s`
    );

    return { config, clock, executor, tokens, bonds, issuer, yields, perp, vault };
}
