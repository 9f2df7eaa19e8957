import logger from '../utils/logger';
import { generateSnapshotId } from '../utils/id';
import { SystemSnapshot } from './snapshot';

export interface StoredSnapshot {
    id: string;
    takenAt: number;
    snapshot: SystemSnapshot;
}

export interface SnapshotStore {
    save(snapshot: SystemSnapshot): Promise<StoredSnapshot>;
    latest(): Promise<StoredSnapshot | null>;
}

/**
 * Process-local store. Used by tests and when no database is configured.
 */
export class MemorySnapshotStore implements SnapshotStore {
    private readonly items: StoredSnapshot[] = [];

    constructor(private readonly retain: number = 50) {}

    async save(snapshot: SystemSnapshot): Promise<StoredSnapshot> {
        const stored: StoredSnapshot = { id: generateSnapshotId(), takenAt: snapshot.takenAt, snapshot };
        this.items.push(stored);
        if (this.items.length > this.retain) {
            this.items.shift();
        }
        logger.debug(`[STORE] memory snapshot=${stored.id} retained=${this.items.length}`);
        return stored;
    }

    async latest(): Promise<StoredSnapshot | null> {
        return this.items[this.items.length - 1] ?? null;
    }

    get size(): number {
        return this.items.length;
    }
}
