/**
 * Snapshot persistence in Supabase.
 *
 * TABLE ledger_snapshots:
 * - id TEXT PRIMARY KEY        (snap_{epochMs}_{uuid-prefix})
 * - taken_at BIGINT NOT NULL   (ledger clock, unix seconds)
 * - payload TEXT NOT NULL      (serializeSnapshot output)
 * - created_at TIMESTAMPTZ
 */

import { SupabaseClient } from '@supabase/supabase-js';
import logger from '../utils/logger';
import { generateSnapshotId } from '../utils/id';
import { SystemSnapshot, deserializeSnapshot, serializeSnapshot } from './snapshot';
import { SnapshotStore, StoredSnapshot } from './snapshotStore';

export const SNAPSHOT_TABLE = 'ledger_snapshots';

export class SnapshotStoreError extends Error {
    constructor(
        public readonly operation: 'save' | 'latest',
        public readonly reason: string
    ) {
        super(`[STORE] ${operation} failed: ${reason}`);
        this.name = 'SnapshotStoreError';
    }
}

export class SupabaseSnapshotStore implements SnapshotStore {
    constructor(
        private readonly client: SupabaseClient,
        private readonly table: string = SNAPSHOT_TABLE
    ) {}

    async save(snapshot: SystemSnapshot): Promise<StoredSnapshot> {
        const id = generateSnapshotId();
        const { error } = await this.client.from(this.table).insert({
            id,
            taken_at: snapshot.takenAt,
            payload: serializeSnapshot(snapshot),
            created_at: new Date().toISOString(),
        });

        // HARD FAIL on insert errors
        if (error) {
            logger.error(`[STORE] insert failed id=${id}: ${error.message}`);
            throw new SnapshotStoreError('save', error.message);
        }

        logger.info(`[STORE] saved snapshot=${id} takenAt=${snapshot.takenAt}`);
        return { id, takenAt: snapshot.takenAt, snapshot };
    }

    async latest(): Promise<StoredSnapshot | null> {
        const { data, error } = await this.client
            .from(this.table)
            .select('id, taken_at, payload')
            .order('taken_at', { ascending: false })
            .limit(1)
            .maybeSingle();

        if (error) {
            logger.error(`[STORE] latest snapshot query failed: ${error.message}`);
            throw new SnapshotStoreError('latest', error.message);
        }
        if (!data) {
            return null;
        }
        if (typeof data.id !== 'string' || typeof data.payload !== 'string') {
            throw new SnapshotStoreError('latest', 'unexpected row shape');
        }

        const snapshot = deserializeSnapshot(data.payload);
        return { id: data.id, takenAt: snapshot.takenAt, snapshot };
    }
}
