import dotenv from 'dotenv';
dotenv.config();

import { FIXED_POINT, LEDGER_DEFAULTS } from './constants';
import { UnacceptableParams } from '../core/errors';
import { parseFixedPt } from '../utils/math';

// ═══════════════════════════════════════════════════════════════════════════════
// LEDGER CONFIGURATION — ENVIRONMENT OVERRIDES ON TOP OF LEDGER_DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════
//
// Amounts (DUST_FLOOR, MIN_DEPLOYMENT_AMT, RESERVED_UNDERLYING_BAL) are raw
// integer token units. Percentages and yields are decimals:
//   RESERVED_UNDERLYING_PERC=0.1   → 10%
//   DEFINED_YIELDS=1,0             → senior 100%, junior 0%
//

export interface LedgerConfig {
    underlying: string;
    dustFloor: bigint;
    minMaturitySec: number;
    maxMaturitySec: number;
    bondDurationSec: number;
    issueIntervalSec: number;
    issueWindowOffsetSec: number;
    trancheRatios: number[];
    definedYields: bigint[];
    minDeploymentAmt: bigint;
    reservedUnderlyingBal: bigint;
    reservedUnderlyingPerc: bigint;
    maxDeployedCount: number;
    minUnderlyingPerc: bigint;
    maxUnderlyingPerc: bigint;
    freezeYieldOnFirstUse: boolean;
    keeperIntervalMs: number;
    supabaseUrl: string | null;
    supabaseKey: string | null;
}

type Env = Record<string, string | undefined>;

const read = (env: Env, key: string): string | undefined => {
    const value = env[key]?.trim();
    return value === undefined || value === '' ? undefined : value;
};

const envInt = (env: Env, key: string, fallback: number): number => {
    const raw = read(env, key);
    if (raw === undefined) {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new UnacceptableParams(`${key} must be a non-negative integer`, { value: raw });
    }
    return value;
};

const envAmount = (env: Env, key: string, fallback: bigint): bigint => {
    const raw = read(env, key);
    if (raw === undefined) {
        return fallback;
    }
    if (!/^\d+$/.test(raw)) {
        throw new UnacceptableParams(`${key} must be an integer token amount`, { value: raw });
    }
    return BigInt(raw);
};

const envDecimal = (env: Env, key: string, decimals: number, fallback: bigint): bigint => {
    const raw = read(env, key);
    return raw === undefined ? fallback : parseFixedPt(raw, decimals);
};

const envBool = (env: Env, key: string, fallback: boolean): boolean => {
    const raw = read(env, key);
    return raw === undefined ? fallback : raw === 'true' || raw === '1';
};

const envList = (env: Env, key: string): string[] | undefined => {
    return read(env, key)?.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
};

const DEFAULT_YIELDS = (ratios: readonly number[]): bigint[] =>
    ratios.map((_, i) => (i === 0 ? parseFixedPt('1', FIXED_POINT.YIELD_DECIMALS) : 0n));

export function loadConfig(env: Env = process.env): LedgerConfig {
    const trancheRatios: number[] = envList(env, 'TRANCHE_RATIOS')?.map(Number) ?? [...LEDGER_DEFAULTS.TRANCHE_RATIOS];
    if (trancheRatios.some((r) => !Number.isInteger(r) || r <= 0)) {
        throw new UnacceptableParams('TRANCHE_RATIOS must be positive integers', { trancheRatios });
    }

    const definedYields = envList(env, 'DEFINED_YIELDS')?.map((y) => parseFixedPt(y, FIXED_POINT.YIELD_DECIMALS))
        ?? DEFAULT_YIELDS(trancheRatios);
    if (definedYields.length !== trancheRatios.length) {
        throw new UnacceptableParams('DEFINED_YIELDS needs one entry per tranche', {
            yields: definedYields.length,
            tranches: trancheRatios.length,
        });
    }

    const config: LedgerConfig = {
        underlying: read(env, 'UNDERLYING_ASSET') ?? 'UNDERLYING',
        dustFloor: envAmount(env, 'DUST_FLOOR', LEDGER_DEFAULTS.DUST_FLOOR),
        minMaturitySec: envInt(env, 'MIN_MATURITY_SEC', LEDGER_DEFAULTS.MIN_MATURITY_SEC),
        maxMaturitySec: envInt(env, 'MAX_MATURITY_SEC', LEDGER_DEFAULTS.MAX_MATURITY_SEC),
        bondDurationSec: envInt(env, 'BOND_DURATION_SEC', LEDGER_DEFAULTS.BOND_DURATION_SEC),
        issueIntervalSec: envInt(env, 'ISSUE_INTERVAL_SEC', LEDGER_DEFAULTS.ISSUE_INTERVAL_SEC),
        issueWindowOffsetSec: envInt(env, 'ISSUE_WINDOW_OFFSET_SEC', LEDGER_DEFAULTS.ISSUE_WINDOW_OFFSET_SEC),
        trancheRatios,
        definedYields,
        minDeploymentAmt: envAmount(env, 'MIN_DEPLOYMENT_AMT', LEDGER_DEFAULTS.MIN_DEPLOYMENT_AMT),
        reservedUnderlyingBal: envAmount(env, 'RESERVED_UNDERLYING_BAL', LEDGER_DEFAULTS.RESERVED_UNDERLYING_BAL),
        reservedUnderlyingPerc: envDecimal(env, 'RESERVED_UNDERLYING_PERC', FIXED_POINT.PERC_DECIMALS, LEDGER_DEFAULTS.RESERVED_UNDERLYING_PERC),
        maxDeployedCount: envInt(env, 'MAX_DEPLOYED_COUNT', LEDGER_DEFAULTS.MAX_DEPLOYED_COUNT),
        minUnderlyingPerc: envDecimal(env, 'MIN_UNDERLYING_PERC', FIXED_POINT.PERC_DECIMALS, LEDGER_DEFAULTS.MIN_UNDERLYING_PERC),
        maxUnderlyingPerc: envDecimal(env, 'MAX_UNDERLYING_PERC', FIXED_POINT.PERC_DECIMALS, LEDGER_DEFAULTS.MAX_UNDERLYING_PERC),
        freezeYieldOnFirstUse: envBool(env, 'FREEZE_YIELD_ON_FIRST_USE', LEDGER_DEFAULTS.FREEZE_YIELD_ON_FIRST_USE),
        keeperIntervalMs: envInt(env, 'KEEPER_INTERVAL_MS', LEDGER_DEFAULTS.KEEPER_INTERVAL_MS),
        supabaseUrl: read(env, 'SUPABASE_URL') ?? null,
        supabaseKey: read(env, 'SUPABASE_SERVICE_ROLE_KEY') ?? read(env, 'SUPABASE_KEY') ?? null,
    };

    if (config.maxMaturitySec <= config.minMaturitySec) {
        throw new UnacceptableParams('MAX_MATURITY_SEC must exceed MIN_MATURITY_SEC', {
            min: config.minMaturitySec,
            max: config.maxMaturitySec,
        });
    }
    return config;
}
