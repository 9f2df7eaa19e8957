/**
 * Reserve Ledger — which asset balances back outstanding claims/shares
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * INVARIANTS (HARD RULES):
 *   1. An asset is tracked iff its holder balance exceeded the dust floor
 *      at its last sync
 *   2. syncAsset() is the ONLY mutator of membership; every balance-changing
 *      operation MUST sync the assets it touched
 *   3. Enumeration follows insertion order (redemption iterates it)
 *
 * Dust is written off: aggregateValue() skips assets whose balance fell to
 * dust since the last sync, so the reported value can be lower than the
 * literal sum of every transfer ever made.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { AccountId, AssetId, TokenLedger, ValuationFn } from '../types';
import { UnacceptableParams } from '../core/errors';
import { Snapshottable } from '../state/atomic';

export interface ReserveLedgerState {
    assets: AssetId[];
}

export interface ReserveEntry {
    asset: AssetId;
    balance: bigint;
}

export class ReserveLedger implements Snapshottable<ReserveLedgerState> {
    // Set iteration order is insertion order
    private tracked = new Set<AssetId>();

    constructor(
        private readonly tokens: TokenLedger,
        public readonly holder: AccountId,
        public readonly dustFloor: bigint,
        private readonly logPrefix: string = '[RESERVE]'
    ) {
        if (dustFloor < 0n) {
            throw new UnacceptableParams('dust floor must be non-negative', { dustFloor: dustFloor.toString() });
        }
    }

    /**
     * Re-derive membership of `asset` from the holder's live balance.
     * Returns the balance that was synced.
     */
    syncAsset(asset: AssetId): bigint {
        const balance = this.tokens.balanceOf(asset, this.holder);
        const present = this.tracked.has(asset);

        if (balance > this.dustFloor && !present) {
            this.tracked.add(asset);
            logger.info(`${this.logPrefix} ADD asset=${asset} balance=${balance} count=${this.tracked.size}`);
        } else if (balance <= this.dustFloor && present) {
            this.tracked.delete(asset);
            logger.info(`${this.logPrefix} REMOVE asset=${asset} balance=${balance} count=${this.tracked.size}`);
        }

        return balance;
    }

    balanceOf(asset: AssetId): bigint {
        return this.tokens.balanceOf(asset, this.holder);
    }

    has(asset: AssetId): boolean {
        return this.tracked.has(asset);
    }

    get count(): number {
        return this.tracked.size;
    }

    at(index: number): AssetId {
        const asset = Array.from(this.tracked)[index];
        if (asset === undefined) {
            throw new UnacceptableParams(`reserve index ${index} out of bounds`, { count: this.tracked.size });
        }
        return asset;
    }

    assets(): AssetId[] {
        return Array.from(this.tracked);
    }

    /**
     * Tracked assets with their live balances, dust excluded.
     */
    entries(): ReserveEntry[] {
        const entries: ReserveEntry[] = [];
        for (const asset of this.tracked) {
            const balance = this.balanceOf(asset);
            if (balance > this.dustFloor) {
                entries.push({ asset, balance });
            }
        }
        return entries;
    }

    aggregateValue(valuationFn: ValuationFn): bigint {
        return this.entries().reduce((sum, { asset, balance }) => sum + valuationFn(asset, balance), 0n);
    }

    snapshot(): ReserveLedgerState {
        return { assets: Array.from(this.tracked) };
    }

    restore(state: ReserveLedgerState): void {
        this.tracked = new Set(state.assets);
    }
}
