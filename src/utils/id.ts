/**
 * ID Generation Utilities
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Operation and snapshot identifiers. Every atomic operation gets a fresh id
 * so that its log lines (including a rollback) can be correlated.
 *
 * FORMAT:
 * - Operation:  op_{uuid-prefix}_{nanoseconds}
 * - Snapshot:   snap_{epochMs}_{uuid-prefix}
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a unique id for one atomic operation.
 *
 * @example
 * ```typescript
 * const opId = generateOperationId();
 * // Returns: "op_550e8400_1234567890123456789"
 * ```
 */
export function generateOperationId(): string {
    const uuid = uuidv4().split('-')[0];
    const nano = process.hrtime.bigint().toString();
    return `op_${uuid}_${nano}`;
}

/**
 * Generate an id for a persisted ledger snapshot. Sorts by creation time.
 */
export function generateSnapshotId(now: number = Date.now()): string {
    const uuid = uuidv4().split('-')[0];
    return `snap_${now}_${uuid}`;
}
