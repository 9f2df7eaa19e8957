import { ALICE, COLL, T0, buildLedger } from './helpers/ledgerFixture';
import { KeeperHandle, runKeeperTick, startKeeper } from '../src/runtime/keeper';
import { MemorySnapshotStore, SnapshotStore, StoredSnapshot } from '../src/storage/snapshotStore';

describe('runKeeperTick', () => {
    test('empty vault skips redeployment but still snapshots', async () => {
        const ledger = buildLedger();
        const store = new MemorySnapshotStore();

        const result = await runKeeperTick(ledger, store);

        expect(result.matured).toBe('ok');
        expect(result.redeploy).toBe('skipped');
        expect(result.vaultNavPerShare).toBe(0n);
        expect(result.snapshot.takenAt).toBe(T0);
        expect(store.size).toBe(1);
    });

    test('funded vault is deployed', async () => {
        const ledger = buildLedger();
        ledger.tokens.mint(COLL, ALICE, 10n);
        ledger.vault.deposit(ALICE, 10n);

        const result = await runKeeperTick(ledger, new MemorySnapshotStore());

        expect(result.redeploy).toBe('ok');
        expect(ledger.vault.deployedAssets()).toEqual(['BOND-1-T0', 'BOND-1-T1']);
        // 10 underlying of TVL over 10_000_000 shares
        expect(result.vaultNavPerShare).toBe(10n ** 12n);
    });

    test('other ledger errors are reported as failed', async () => {
        const ledger = buildLedger({ config: { maxDeployedCount: 1 } });
        ledger.tokens.mint(COLL, ALICE, 10n);
        ledger.vault.deposit(ALICE, 10n);

        const result = await runKeeperTick(ledger, new MemorySnapshotStore());

        expect(result.redeploy).toBe('failed');
        expect(ledger.tokens.balanceOf(COLL, 'vault:reserve')).toBe(10n);
    });
});

describe('startKeeper', () => {
    let keeper: KeeperHandle | null = null;

    beforeEach(() => {
        jest.useFakeTimers();
    });

    afterEach(() => {
        keeper?.stop();
        keeper = null;
        jest.useRealTimers();
    });

    function storeWith(save: SnapshotStore['save']) {
        return { save: jest.fn(save), latest: async () => null };
    }

    test('ticks once per interval', async () => {
        const store = new MemorySnapshotStore();
        keeper = startKeeper(buildLedger(), store, 1000);

        await jest.advanceTimersByTimeAsync(3000);

        expect(store.size).toBe(3);
    });

    test('skips intervals while a snapshot is still being saved', async () => {
        const store = storeWith(() => new Promise<StoredSnapshot>(() => undefined));
        keeper = startKeeper(buildLedger(), store, 1000);

        await jest.advanceTimersByTimeAsync(3000);

        expect(store.save).toHaveBeenCalledTimes(1);
    });

    test('a failing store does not stop the loop', async () => {
        const store = storeWith(() => Promise.reject(new Error('store unavailable')));
        keeper = startKeeper(buildLedger(), store, 1000);

        await jest.advanceTimersByTimeAsync(2000);

        expect(store.save).toHaveBeenCalledTimes(2);
    });

    test('stop clears the interval', async () => {
        const store = new MemorySnapshotStore();
        startKeeper(buildLedger(), store, 1000).stop();

        await jest.advanceTimersByTimeAsync(2000);

        expect(store.size).toBe(0);
    });
});
