/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS — PUBLIC SURFACE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * RULES:
 * 1. NO runtime logic at import time
 * 2. The keeper lives in start.ts; importing this module never starts it
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export * from './types';
export * from './core/errors';
export { tranchesToClaim, claimToTranches, isConvertible } from './core/conversion';
export { BondQueue, BondQueueManager, MaturityWindow } from './core/bondQueue';
export { YieldTable, bondClassKey, classKeyOf } from './core/yieldTable';
export { ReserveLedger, ReserveEntry } from './capital/reserveLedger';
export { TokenBook } from './capital/tokenBook';
export { AtomicExecutor, Snapshottable } from './state/atomic';
export { BondController, BondFactory } from './collaborators/bondFactory';
export { InMemoryBondIssuer, BondIssuerConfig } from './collaborators/bondIssuer';
export { StaticFeePolicy, FeeSchedule, FEE_DECIMALS } from './collaborators/feePolicy';
export { TablePricingSource } from './collaborators/pricing';
export { createValuation } from './collaborators/valuation';
export {
    PerpetualClaim,
    DepositResult,
    RedemptionResult,
    RolloverResult,
} from './engine/claimIssuanceEngine';
export { RolloverVault, DeployResult, SwapResult, VaultPhase } from './engine/rolloverVault';
export { computeMintAmt, computeRedemptionAmts, navPerShare } from './engine/vaultNav';
export { LedgerConfig, loadConfig } from './config';
export { LedgerSystem, createSystem } from './bootstrap';
export {
    SystemSnapshot,
    captureSnapshot,
    restoreSnapshot,
    serializeSnapshot,
    deserializeSnapshot,
} from './storage/snapshot';
export { SnapshotStore, StoredSnapshot, MemorySnapshotStore } from './storage/snapshotStore';
export { SupabaseSnapshotStore } from './storage/supabaseSnapshotStore';
export { runKeeperTick } from './runtime/keeper';
