/**
 * System snapshots — the persisted form of the ledger.
 *
 * A snapshot is the state of every registered component at one instant,
 * i.e. what the atomic executor would restore on rollback. Bigints are
 * written as `{ "$bigint": "<digits>" }` so that JSON round-trips them.
 */

import { LedgerSystem } from '../bootstrap';
import { TokenBookState } from '../capital/tokenBook';
import { ReserveLedgerState } from '../capital/reserveLedger';
import { BondQueueState } from '../core/bondQueue';
import { YieldTableState } from '../core/yieldTable';
import { BondFactoryState } from '../collaborators/bondFactory';
import { BondIssuerState } from '../collaborators/bondIssuer';
import { UnacceptableParams } from '../core/errors';

export const SNAPSHOT_VERSION = 1;

export interface SystemSnapshot {
    version: typeof SNAPSHOT_VERSION;
    takenAt: number;
    tokens: TokenBookState;
    bonds: BondFactoryState;
    issuer: BondIssuerState;
    yields: YieldTableState;
    perpQueue: BondQueueState;
    perpReserve: ReserveLedgerState;
    vaultReserve: ReserveLedgerState;
}

const SECTIONS = ['tokens', 'bonds', 'issuer', 'yields', 'perpQueue', 'perpReserve', 'vaultReserve'] as const;

export function captureSnapshot(system: LedgerSystem): SystemSnapshot {
    return {
        version: SNAPSHOT_VERSION,
        takenAt: system.clock(),
        tokens: system.tokens.snapshot(),
        bonds: system.bonds.snapshot(),
        issuer: system.issuer.snapshot(),
        yields: system.yields.snapshot(),
        perpQueue: system.perp.queue.snapshot(),
        perpReserve: system.perp.reserve.snapshot(),
        vaultReserve: system.vault.ledger.snapshot(),
    };
}

export function restoreSnapshot(system: LedgerSystem, snapshot: SystemSnapshot): void {
    system.tokens.restore(snapshot.tokens);
    system.bonds.restore(snapshot.bonds);
    system.issuer.restore(snapshot.issuer);
    system.yields.restore(snapshot.yields);
    system.perp.queue.restore(snapshot.perpQueue);
    system.perp.reserve.restore(snapshot.perpReserve);
    system.vault.ledger.restore(snapshot.vaultReserve);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const BIGINT_TAG = '$bigint';

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

export function isSystemSnapshot(value: unknown): value is SystemSnapshot {
    return (
        isRecord(value) &&
        value.version === SNAPSHOT_VERSION &&
        typeof value.takenAt === 'number' &&
        SECTIONS.every((section) => isRecord(value[section]))
    );
}

export function serializeSnapshot(snapshot: SystemSnapshot): string {
    return JSON.stringify(snapshot, (_key, value: unknown) =>
        typeof value === 'bigint' ? { [BIGINT_TAG]: value.toString() } : value
    );
}

export function deserializeSnapshot(text: string): SystemSnapshot {
    const parsed: unknown = JSON.parse(text, (_key, value: unknown) => {
        if (isRecord(value) && typeof value[BIGINT_TAG] === 'string' && Object.keys(value).length === 1) {
            return BigInt(String(value[BIGINT_TAG]));
        }
        return value;
    });
    if (!isSystemSnapshot(parsed)) {
        throw new UnacceptableParams('malformed ledger snapshot');
    }
    return parsed;
}
