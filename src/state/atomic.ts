/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * ATOMIC EXECUTOR — ALL-OR-NOTHING OPERATIONS + REENTRANCY GUARD
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Every public mutating operation of the claim engine and the vault runs
 * through run(). Operations are synchronous, so on the Node event loop an
 * operation cannot interleave with another one; what remains is:
 *
 * 1. ROLLBACK: the outermost run() snapshots every registered participant
 *    and restores all of them if the operation throws.
 * 2. REENTRANCY: an owner (engine instance) may not re-enter itself while
 *    one of its operations is on the stack. A different owner may nest
 *    (vault → claim engine rollover) and joins the outer unit of work.
 * 3. PHASES: the owner's active phase (e.g. 'deploying') is observable
 *    while it runs and resets to idle afterwards.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { generateOperationId } from '../utils/id';
import { ReentrantCall, isLedgerError } from '../core/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A stateful component whose state can be captured and restored.
 */
export interface Snapshottable<S = unknown> {
    snapshot(): S;
    restore(state: S): void;
}

interface Frame {
    owner: object;
    label: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTOR
// ═══════════════════════════════════════════════════════════════════════════════

export class AtomicExecutor {
    private readonly captures: Array<() => () => void> = [];
    private readonly stack: Frame[] = [];
    private currentOpId: string | null = null;

    register<S>(participant: Snapshottable<S>): void {
        this.captures.push(() => {
            const state = participant.snapshot();
            return () => participant.restore(state);
        });
    }

    get depth(): number {
        return this.stack.length;
    }

    get operationId(): string | null {
        return this.currentOpId;
    }

    /**
     * Label of the owner's operation currently on the stack, or 'idle'.
     */
    phaseOf(owner: object): string {
        const frame = this.stack.find((f) => f.owner === owner);
        return frame ? frame.label : 'idle';
    }

    run<T>(owner: object, label: string, fn: () => T): T {
        const reentered = this.stack.find((f) => f.owner === owner);
        if (reentered) {
            throw new ReentrantCall(`'${label}' called while '${reentered.label}' is in progress`, {
                active: reentered.label,
                requested: label,
            });
        }

        if (this.stack.length > 0) {
            // Nested call from another owner: the outer frame owns rollback
            this.stack.push({ owner, label });
            try {
                return fn();
            } finally {
                this.stack.pop();
            }
        }

        const opId = generateOperationId();
        const rollbacks = this.captures.map((capture) => capture());
        this.currentOpId = opId;
        this.stack.push({ owner, label });

        try {
            const result = fn();
            logger.debug(`[ATOMIC] ${label} committed op=${opId}`);
            return result;
        } catch (err) {
            rollbacks.forEach((rollback) => rollback());
            if (isLedgerError(err)) {
                logger.warn(`[ATOMIC] ${label} rolled back op=${opId} ${err.message}`);
            } else {
                const message = err instanceof Error ? err.message : String(err);
                logger.error(`[ATOMIC] ${label} rolled back op=${opId} unexpected: ${message}`);
            }
            throw err;
        } finally {
            this.stack.pop();
            this.currentOpId = null;
        }
    }
}
