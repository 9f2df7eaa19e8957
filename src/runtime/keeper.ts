/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * KEEPER — THE SOLE RUNTIME DRIVER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * One tick:
 *   1. Redeem matured tranches held by the claim reserve
 *   2. vault.recoverAndRedeploy()
 *   3. Persist a snapshot
 *
 * Ledger errors in steps 1-2 are expected outcomes (nothing to deploy, no
 * admissible bond yet) and never stop the keeper; the executor has already
 * rolled the failed step back. Store failures propagate to the caller; the
 * interval loop logs them and keeps ticking.
 *
 * The loop never overlaps ticks: an interval that fires while a snapshot is
 * still being saved is skipped.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { ONE_PRICE } from '../config/constants';
import { LedgerSystem } from '../bootstrap';
import { InsufficientDeployment, isLedgerError } from '../core/errors';
import { captureSnapshot } from '../storage/snapshot';
import { SnapshotStore, StoredSnapshot } from '../storage/snapshotStore';
import { navPerShare } from '../engine/vaultNav';

export type StepOutcome = 'ok' | 'skipped' | 'failed';

export interface KeeperTickResult {
    matured: StepOutcome;
    redeploy: StepOutcome;
    /** Vault TVL per share, PRICE_DECIMALS places; 0 with no shares out. */
    vaultNavPerShare: bigint;
    snapshot: StoredSnapshot;
}

export interface KeeperHandle {
    stop(): void;
}

function runStep(name: string, step: () => void): StepOutcome {
    try {
        step();
        return 'ok';
    } catch (err) {
        if (err instanceof InsufficientDeployment) {
            logger.info(`[KEEPER] ${name} skipped: ${err.reason}`);
            return 'skipped';
        }
        if (isLedgerError(err)) {
            logger.warn(`[KEEPER] ${name} failed: ${err.message}`);
            return 'failed';
        }
        throw err;
    }
}

export async function runKeeperTick(system: LedgerSystem, store: SnapshotStore): Promise<KeeperTickResult> {
    const matured = runStep('redeemMatureTranches', () => {
        system.perp.redeemMatureTranches();
    });
    const redeploy = runStep('recoverAndRedeploy', () => {
        system.vault.recoverAndRedeploy();
    });

    const vaultTVL = system.vault.getTVL();
    const vaultNavPerShare = navPerShare(vaultTVL, system.vault.totalShares(), ONE_PRICE);

    const snapshot = await store.save(captureSnapshot(system));
    logger.info(
        `[KEEPER] tick matured=${matured} redeploy=${redeploy} snapshot=${snapshot.id} ` +
        `perpTVL=${system.perp.getTVL()} vaultTVL=${vaultTVL} navPerShare=${vaultNavPerShare}`
    );
    return { matured, redeploy, vaultNavPerShare, snapshot };
}

export function startKeeper(system: LedgerSystem, store: SnapshotStore, intervalMs: number): KeeperHandle {
    let inFlight = false;

    const handle = setInterval(() => {
        if (inFlight) {
            logger.warn('[KEEPER] previous tick still in flight, skipping');
            return;
        }
        inFlight = true;

        runKeeperTick(system, store)
            .catch((error: unknown) => {
                logger.error(`[KEEPER] tick failed: ${error instanceof Error ? error.message : String(error)}`);
            })
            .finally(() => {
                inFlight = false;
            });
    }, intervalMs);

    logger.info(`[KEEPER] started interval=${intervalMs}ms`);
    return {
        stop() {
            clearInterval(handle);
            logger.info('[KEEPER] stopped');
        },
    };
}
