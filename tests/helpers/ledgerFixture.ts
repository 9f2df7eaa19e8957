/**
 * Shared fixture: a full ledger system on a controllable clock.
 *
 * T0 is aligned to the 1200s issue interval, so the first bond issued at
 * T0 matures at T0 + 4800 and a fresh bond is issued every 1200s.
 */

import { LedgerConfig } from '../../src/config';
import { LedgerSystem, createSystem } from '../../src/bootstrap';
import { StaticFeePolicy, FeeSchedule } from '../../src/collaborators/feePolicy';
import { TablePricingSource } from '../../src/collaborators/pricing';
import { AccountId, BondBatch, PricingSource } from '../../src/types';

export const T0 = 1_700_000_400;
export const COLL = 'COLL';
export const ALICE = 'alice';
export const BOB = 'bob';

export const TEST_CONFIG: LedgerConfig = {
    underlying: COLL,
    dustFloor: 0n,
    minMaturitySec: 1200,
    maxMaturitySec: 6000,
    bondDurationSec: 4800,
    issueIntervalSec: 1200,
    issueWindowOffsetSec: 0,
    trancheRatios: [200, 800],
    definedYields: [1_000_000n, 0n],
    minDeploymentAmt: 0n,
    reservedUnderlyingBal: 0n,
    reservedUnderlyingPerc: 0n,
    maxDeployedCount: 47,
    minUnderlyingPerc: 0n,
    maxUnderlyingPerc: 100_000_000n,
    freezeYieldOnFirstUse: true,
    keeperIntervalMs: 600_000,
    supabaseUrl: null,
    supabaseKey: null,
};

export interface TestLedger extends LedgerSystem {
    time: { now: number };
    fees: StaticFeePolicy;
    prices: TablePricingSource;
    advance(seconds: number): void;
}

export interface FixtureOptions {
    config?: Partial<LedgerConfig>;
    fees?: Partial<FeeSchedule>;
    pricing?: PricingSource;
}

export function buildLedger(options: FixtureOptions = {}): TestLedger {
    const time = { now: T0 };
    const fees = new StaticFeePolicy(options.fees);
    const prices = new TablePricingSource();
    const system = createSystem(
        { ...TEST_CONFIG, ...options.config },
        { clock: () => time.now, feePolicy: fees, pricing: options.pricing ?? prices }
    );
    return {
        ...system,
        time,
        fees,
        prices,
        advance(seconds: number) {
            time.now += seconds;
        },
    };
}

/**
 * Tranches `collateralAmt` of fresh collateral for `account` through the
 * current minting bond.
 */
export function trancheFor(ledger: TestLedger, account: AccountId, collateralAmt: bigint): BondBatch {
    ledger.tokens.mint(COLL, account, collateralAmt);
    const bond = ledger.perp.getMintingBond();
    ledger.bonds.controller(bond.id).deposit(account, collateralAmt);
    return bond;
}

/**
 * Tranches 5x `seniorAmt` collateral (20/80 split) and deposits the senior
 * tranche into the claim engine.
 */
export function depositSenior(ledger: TestLedger, account: AccountId, seniorAmt: bigint): BondBatch {
    const bond = trancheFor(ledger, account, seniorAmt * 5n);
    ledger.perp.deposit(account, bond.tranches[0].id, seniorAmt);
    return bond;
}
