/**
 * Bond Queue Manager
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * FIFO of bonds keyed by maturity.
 *
 *   head ── nearest maturity ── "burning" end  (redemptions start here)
 *   tail ── furthest maturity ── "minting" end (deposits go here)
 *
 * INVARIANTS:
 *   1. Maturities strictly increase from head to tail
 *   2. No bond appears twice
 *   3. Eviction is monotonic: a dequeued bond is never admitted again
 *
 * A bond is admissible while  now + min <= maturity < now + max.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { BondBatch, BondId, BondIssuer } from '../types';
import { UnacceptableBond, UnacceptableParams } from './errors';
import { Snapshottable } from '../state/atomic';

export interface MaturityWindow {
    minMaturitySec: number;
    maxMaturitySec: number;
}

export interface BondQueueState {
    items: BondBatch[];
    evicted: BondId[];
    window: MaturityWindow;
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUEUE
// ═══════════════════════════════════════════════════════════════════════════════

export class BondQueue {
    private items: BondBatch[] = [];

    get length(): number {
        return this.items.length;
    }

    head(): BondBatch | null {
        return this.items[0] ?? null;
    }

    tail(): BondBatch | null {
        return this.items[this.items.length - 1] ?? null;
    }

    at(index: number): BondBatch {
        const bond = this.items[index];
        if (!bond) {
            throw new UnacceptableParams(`queue index ${index} out of bounds`, { length: this.items.length });
        }
        return bond;
    }

    contains(bondId: BondId): boolean {
        return this.items.some((b) => b.id === bondId);
    }

    enqueue(bond: BondBatch): void {
        if (this.contains(bond.id)) {
            throw new UnacceptableBond(`bond ${bond.id} already in queue`, { bondId: bond.id });
        }
        const tail = this.tail();
        if (tail && bond.maturity <= tail.maturity) {
            throw new UnacceptableBond(`bond ${bond.id} matures before queue tail`, {
                bondId: bond.id,
                maturity: bond.maturity,
                tailMaturity: tail.maturity,
            });
        }
        this.items.push(bond);
    }

    dequeue(): BondBatch {
        const head = this.items.shift();
        if (!head) {
            throw new UnacceptableParams('dequeue on empty bond queue');
        }
        return head;
    }

    toArray(): BondBatch[] {
        return [...this.items];
    }

    load(items: BondBatch[]): void {
        this.items = [...items];
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MANAGER
// ═══════════════════════════════════════════════════════════════════════════════

export class BondQueueManager implements Snapshottable<BondQueueState> {
    private readonly queue = new BondQueue();
    private evicted = new Set<BondId>();
    private window: MaturityWindow;

    constructor(
        private issuer: BondIssuer,
        window: MaturityWindow
    ) {
        BondQueueManager.assertWindow(window);
        this.window = { ...window };
    }

    static assertWindow(window: MaturityWindow): void {
        if (window.maxMaturitySec <= window.minMaturitySec) {
            throw new UnacceptableParams('expected max maturity to be greater than min', { ...window });
        }
    }

    get maturityWindow(): MaturityWindow {
        return { ...this.window };
    }

    get length(): number {
        return this.queue.length;
    }

    at(index: number): BondBatch {
        return this.queue.at(index);
    }

    contains(bondId: BondId): boolean {
        return this.queue.contains(bondId);
    }

    bonds(): BondBatch[] {
        return this.queue.toArray();
    }

    setIssuer(issuer: BondIssuer): void {
        this.issuer = issuer;
    }

    updateTolerableMaturity(window: MaturityWindow): void {
        BondQueueManager.assertWindow(window);
        this.window = { ...window };
        logger.info(`[QUEUE] maturity window min=${window.minMaturitySec}s max=${window.maxMaturitySec}s`);
    }

    isAdmissible(bond: BondBatch, now: number): boolean {
        return (
            bond.maturity >= now + this.window.minMaturitySec &&
            bond.maturity < now + this.window.maxMaturitySec
        );
    }

    /**
     * Current minting bond. Admits the issuer's latest bond at the tail when
     * it is newer than the current tail.
     */
    getMintingBond(now: number): BondBatch {
        const tail = this.queue.tail();
        const candidate = this.issuer.getLastBond(now);

        if (!candidate) {
            throw new UnacceptableBond('issuer has no bond to mint against');
        }
        if (tail && tail.id === candidate.id && this.isAdmissible(tail, now)) {
            return tail;
        }
        if (!this.issuer.isInstance(candidate.id)) {
            throw new UnacceptableBond(`bond ${candidate.id} was not issued by the trusted issuer`, {
                bondId: candidate.id,
            });
        }
        if (!this.isAdmissible(candidate, now)) {
            throw new UnacceptableBond(`bond ${candidate.id} outside tolerable maturity window`, {
                bondId: candidate.id,
                maturity: candidate.maturity,
                now,
                ...this.window,
            });
        }
        if (this.evicted.has(candidate.id) || this.queue.contains(candidate.id)) {
            throw new UnacceptableBond(`bond ${candidate.id} was already admitted`, { bondId: candidate.id });
        }

        this.queue.enqueue(candidate);
        logger.info(`[QUEUE] ENQUEUE bond=${candidate.id} maturity=${candidate.maturity} length=${this.queue.length}`);
        return candidate;
    }

    /**
     * Evicts every inadmissible bond at the head, then returns the head.
     */
    getBurningBond(now: number): BondBatch | null {
        let head = this.queue.head();
        while (head && !this.isAdmissible(head, now)) {
            this.evict();
            head = this.queue.head();
        }
        return head;
    }

    /**
     * Drops the head bond, e.g. once redemption has exhausted its tranches.
     */
    evict(): BondBatch {
        const bond = this.queue.dequeue();
        this.evicted.add(bond.id);
        logger.info(`[QUEUE] DEQUEUE bond=${bond.id} maturity=${bond.maturity} length=${this.queue.length}`);
        return bond;
    }

    snapshot(): BondQueueState {
        return {
            items: this.queue.toArray(),
            evicted: Array.from(this.evicted),
            window: { ...this.window },
        };
    }

    restore(state: BondQueueState): void {
        this.queue.load(state.items);
        this.evicted = new Set(state.evicted);
        this.window = { ...state.window };
    }
}
