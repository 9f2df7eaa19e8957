/**
 * Reserve Ledger Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Membership follows the holder balance at the last sync; dust is written off.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ReserveLedger } from '../src/capital/reserveLedger';
import { TokenBook } from '../src/capital/tokenBook';
import { InsufficientBalance, UnacceptableParams } from '../src/core/errors';

const HOLDER = 'reserve';
const DUST = 10n;

function setup(): { tokens: TokenBook; ledger: ReserveLedger } {
    const tokens = new TokenBook();
    return { tokens, ledger: new ReserveLedger(tokens, HOLDER, DUST) };
}

describe('ReserveLedger', () => {
    test('adds only above the dust floor', () => {
        const { tokens, ledger } = setup();
        tokens.mint('A', HOLDER, 10n);
        expect(ledger.syncAsset('A')).toBe(10n);
        expect(ledger.has('A')).toBe(false);

        tokens.mint('A', HOLDER, 1n);
        ledger.syncAsset('A');
        expect(ledger.has('A')).toBe(true);
        expect(ledger.count).toBe(1);
    });

    test('removes once the balance falls to dust', () => {
        const { tokens, ledger } = setup();
        tokens.mint('A', HOLDER, 50n);
        ledger.syncAsset('A');
        tokens.transfer('A', HOLDER, 'someone', 45n);
        ledger.syncAsset('A');
        expect(ledger.has('A')).toBe(false);
    });

    test('sync is idempotent', () => {
        const { tokens, ledger } = setup();
        tokens.mint('A', HOLDER, 50n);
        ledger.syncAsset('A');
        ledger.syncAsset('A');
        expect(ledger.assets()).toEqual(['A']);
    });

    test('enumerates in insertion order', () => {
        const { tokens, ledger } = setup();
        for (const asset of ['C', 'A', 'B']) {
            tokens.mint(asset, HOLDER, 100n);
            ledger.syncAsset(asset);
        }
        expect(ledger.assets()).toEqual(['C', 'A', 'B']);
        expect(ledger.at(1)).toBe('A');
        expect(() => ledger.at(3)).toThrow(UnacceptableParams);
    });

    test('aggregateValue skips assets that fell to dust since the last sync', () => {
        const { tokens, ledger } = setup();
        tokens.mint('A', HOLDER, 50n);
        tokens.mint('B', HOLDER, 30n);
        ledger.syncAsset('A');
        ledger.syncAsset('B');

        // No sync after this transfer: B is still tracked but holds dust
        tokens.transfer('B', HOLDER, 'someone', 25n);

        expect(ledger.has('B')).toBe(true);
        expect(ledger.aggregateValue((_asset, balance) => balance * 2n)).toBe(100n);
        expect(ledger.entries()).toEqual([{ asset: 'A', balance: 50n }]);
    });

    test('negative dust floor is rejected', () => {
        expect(() => new ReserveLedger(new TokenBook(), HOLDER, -1n)).toThrow(UnacceptableParams);
    });
});

describe('TokenBook', () => {
    test('transfer moves balances and keeps supply', () => {
        const tokens = new TokenBook();
        tokens.mint('A', 'x', 100n);
        tokens.transfer('A', 'x', 'y', 40n);
        expect(tokens.balanceOf('A', 'x')).toBe(60n);
        expect(tokens.balanceOf('A', 'y')).toBe(40n);
        expect(tokens.totalSupply('A')).toBe(100n);
    });

    test('overdraw and over-burn fail', () => {
        const tokens = new TokenBook();
        tokens.mint('A', 'x', 10n);
        expect(() => tokens.transfer('A', 'x', 'y', 11n)).toThrow(InsufficientBalance);
        expect(() => tokens.burn('A', 'x', 11n)).toThrow(InsufficientBalance);
        expect(() => tokens.mint('A', 'x', -1n)).toThrow(UnacceptableParams);
    });

    test('snapshot and restore', () => {
        const tokens = new TokenBook();
        tokens.mint('A', 'x', 10n);
        const saved = tokens.snapshot();
        tokens.burn('A', 'x', 10n);
        tokens.mint('B', 'y', 5n);
        tokens.restore(saved);
        expect(tokens.balanceOf('A', 'x')).toBe(10n);
        expect(tokens.totalSupply('A')).toBe(10n);
        expect(tokens.totalSupply('B')).toBe(0n);
    });
});
