/**
 * Shared domain types for the tranche ledger.
 *
 * Bonds and tranches are created by the issuer collaborator and become
 * known to the core only through the bond queue. Everything here is
 * immutable once issued.
 */

export type AssetId = string;
export type AccountId = string;
export type BondId = string;

/**
 * A seniority-ordered claim on one bond. Index 0 is the most senior.
 */
export interface Tranche {
    readonly id: AssetId;
    readonly bondId: BondId;
    readonly seniority: number;
    readonly ratio: number; // out of TRANCHE_RATIO_GRANULARITY
}

export interface BondBatch {
    readonly id: BondId;
    readonly collateral: AssetId;
    readonly maturity: number; // unix seconds
    readonly issuedAt: number;
    readonly tranches: readonly Tranche[];
}

/**
 * One asset/amount pair moved by an operation.
 */
export interface TokenAmount {
    asset: AssetId;
    amount: bigint;
}

// ═══════════════════════════════════════════════════════════════════════════════
// COLLABORATOR INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Asset transfer primitive. Failures throw and abort the enclosing call.
 */
export interface TokenLedger {
    balanceOf(asset: AssetId, account: AccountId): bigint;
    totalSupply(asset: AssetId): bigint;
    transfer(asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void;
    mint(asset: AssetId, to: AccountId, amount: bigint): void;
    burn(asset: AssetId, from: AccountId, amount: bigint): void;
}

/**
 * Lookup of issued bonds by id and by tranche.
 */
export interface BondRegistry {
    getBond(bondId: BondId): BondBatch | undefined;
    bondOfTranche(asset: AssetId): BondBatch | undefined;
    trancheOf(asset: AssetId): Tranche | undefined;
}

export interface BondIssuer {
    readonly collateral: AssetId;

    /**
     * Latest issued bond. Implementations may issue a fresh bond as a side
     * effect when the issue window has rolled over.
     */
    getLastBond(now: number): BondBatch | null;
    isInstance(bondId: BondId): boolean;
}

/**
 * Signed fee percentages, fixed-point with `decimals()` places.
 * Positive values are charged to the caller, negative ones paid out.
 */
export interface FeePolicy {
    decimals(): number;
    computePerpMintFeePerc(): bigint;
    computePerpBurnFeePerc(): bigint;
    computePerpRolloverFeePerc(claimEquivalent: bigint): bigint;
    computeVaultMintFeePerc(): bigint;
    computeVaultBurnFeePerc(): bigint;
    computeUnderlyingToPerpSwapFeePerc(): bigint;
    computePerpToUnderlyingSwapFeePerc(): bigint;
}

export interface PricingSource {
    /**
     * Price of one unit of `asset`, scaled by 10^PRICE_DECIMALS.
     */
    price(asset: AssetId): bigint;
}

/**
 * Values a reserve balance in units of the underlying collateral.
 */
export type ValuationFn = (asset: AssetId, balance: bigint) => bigint;
