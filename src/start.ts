import 'dotenv/config';

import logger from './utils/logger';
import { loadConfig } from './config';
import { createSystem } from './bootstrap';
import { createSupabaseClient } from './db/supabase';
import { restoreSnapshot } from './storage/snapshot';
import { MemorySnapshotStore, SnapshotStore } from './storage/snapshotStore';
import { SupabaseSnapshotStore } from './storage/supabaseSnapshotStore';
import { KeeperHandle, runKeeperTick, startKeeper } from './runtime/keeper';

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

let isShuttingDown = false;
let keeper: KeeperHandle | null = null;

function shutdown(signal: string): void {
    if (isShuttingDown) {
        return;
    }
    isShuttingDown = true;
    logger.info(`[SHUTDOWN] received ${signal}, stopping keeper`);
    keeper?.stop();
    process.exit(0);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

process.on('uncaughtException', (error) => {
    logger.error(`[FATAL] uncaught exception: ${error.message}`);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error(`[FATAL] unhandled rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
    process.exit(1);
});

// ═══════════════════════════════════════════════════════════════════════════════
// STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
    const config = loadConfig();
    const system = createSystem(config);

    const client = createSupabaseClient(config);
    const store: SnapshotStore = client ? new SupabaseSnapshotStore(client) : new MemorySnapshotStore();

    const latest = await store.latest();
    if (latest) {
        restoreSnapshot(system, latest.snapshot);
        logger.info(`[STARTUP] restored snapshot=${latest.id} takenAt=${latest.takenAt}`);
    } else {
        logger.info('[STARTUP] no snapshot found, starting from an empty ledger');
    }

    await runKeeperTick(system, store);
    keeper = startKeeper(system, store, config.keeperIntervalMs);
}

main().catch((error: unknown) => {
    logger.error(`[STARTUP] failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
