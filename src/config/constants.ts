// Fixed-point scales and protocol constants for the tranche ledger

export const FIXED_POINT = {
    // Yield factors: 1_000_000 == 100%
    YIELD_DECIMALS: 6,

    // Tranche / claim prices: 10^18 == 1.0
    PRICE_DECIMALS: 18,

    // Percentages used by vault config (reserved balance, liquidity bounds)
    PERC_DECIMALS: 8,

    // Bond tranche ratios are expressed out of this granularity
    TRANCHE_RATIO_GRANULARITY: 1000,
} as const;

export const ONE_YIELD = 10n ** BigInt(FIXED_POINT.YIELD_DECIMALS);
export const ONE_PRICE = 10n ** BigInt(FIXED_POINT.PRICE_DECIMALS);
export const ONE_PERC = 10n ** BigInt(FIXED_POINT.PERC_DECIMALS);

export const VAULT_CONSTANTS = {
    // Shares minted per unit of underlying on the very first deposit
    INITIAL_RATE: 1_000_000n,
} as const;

export const LEDGER_DEFAULTS = {
    DUST_FLOOR: 0n,

    // Tolerable maturity window for queued bonds
    MIN_MATURITY_SEC: 1200,
    MAX_MATURITY_SEC: 6000,

    // Reference issuer cadence
    BOND_DURATION_SEC: 4800,
    ISSUE_INTERVAL_SEC: 1200,
    ISSUE_WINDOW_OFFSET_SEC: 0,
    TRANCHE_RATIOS: [200, 800],

    // Vault deployment
    MIN_DEPLOYMENT_AMT: 0n,
    RESERVED_UNDERLYING_BAL: 0n,
    RESERVED_UNDERLYING_PERC: 0n,
    MAX_DEPLOYED_COUNT: 47,

    // Vault liquidity bounds for swaps (fraction of vault TVL held as underlying)
    MIN_UNDERLYING_PERC: 0n,
    MAX_UNDERLYING_PERC: ONE_PERC,

    FREEZE_YIELD_ON_FIRST_USE: true,

    // Keeper
    KEEPER_INTERVAL_MS: 10 * 60 * 1000, // 10 minutes
} as const;

export const ACCOUNTS = {
    PERP_RESERVE: 'perp:reserve',
    VAULT: 'vault:reserve',
} as const;

export const ASSETS = {
    CLAIM_TOKEN: 'PERP',
    VAULT_SHARE: 'VSHARE',
} as const;
