/**
 * Snapshot Persistence Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * A serialized snapshot restored into a fresh system reproduces the ledger.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ALICE, COLL, T0, buildLedger, depositSenior } from './helpers/ledgerFixture';
import {
    captureSnapshot,
    deserializeSnapshot,
    restoreSnapshot,
    serializeSnapshot,
} from '../src/storage/snapshot';
import { MemorySnapshotStore } from '../src/storage/snapshotStore';
import { UnacceptableParams } from '../src/core/errors';

describe('ledger snapshots', () => {
    test('round trip through JSON into a fresh system', () => {
        const ledger = buildLedger();
        depositSenior(ledger, ALICE, 10n);
        ledger.tokens.mint(COLL, ALICE, 10n);
        ledger.vault.deposit(ALICE, 10n);
        ledger.vault.deploy();

        const text = serializeSnapshot(captureSnapshot(ledger));
        const fresh = buildLedger();
        restoreSnapshot(fresh, deserializeSnapshot(text));

        expect(fresh.tokens.balanceOf('PERP', ALICE)).toBe(10n);
        expect(fresh.perp.queue.length).toBe(1);
        expect(fresh.perp.getTVL()).toBe(10n);
        expect(fresh.vault.deployedAssets()).toEqual(['BOND-1-T0', 'BOND-1-T1']);
        expect(fresh.vault.totalShares()).toBe(10_000_000n);
        expect(fresh.yields.isFrozen('COLL:200-800')).toBe(true);
        expect(fresh.perp.getMintingBond().id).toBe('BOND-1');
    });

    test('bigints are tagged in the serialized form', () => {
        const ledger = buildLedger();
        ledger.tokens.mint(COLL, ALICE, 5n);
        const text = serializeSnapshot(captureSnapshot(ledger));
        expect(text).toContain('{"$bigint":"5"}');
        expect(deserializeSnapshot(text).takenAt).toBe(T0);
    });

    test('malformed payloads are rejected', () => {
        expect(() => deserializeSnapshot('{"version":2}')).toThrow(UnacceptableParams);
        expect(() => deserializeSnapshot('[]')).toThrow(UnacceptableParams);
    });
});

describe('MemorySnapshotStore', () => {
    test('keeps the most recent snapshots', async () => {
        const ledger = buildLedger();
        const store = new MemorySnapshotStore(2);
        expect(await store.latest()).toBeNull();

        await store.save(captureSnapshot(ledger));
        ledger.advance(60);
        await store.save(captureSnapshot(ledger));
        ledger.advance(60);
        const last = await store.save(captureSnapshot(ledger));

        expect(store.size).toBe(2);
        expect(last.id).toMatch(/^snap_\d+_[0-9a-f]{8}$/);
        expect(await store.latest()).toEqual(last);
        expect(last.takenAt).toBe(T0 + 120);
    });
});
