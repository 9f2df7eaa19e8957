/**
 * Reference bond issuer.
 *
 * Issues at most one bond per issue window. Windows start at
 *   now - (now % minIssueTimeIntervalSec) + issueWindowOffsetSec
 * and every bond matures `maxMaturityDuration` seconds after its window
 * opens, so bonds issued by one issuer have strictly increasing maturities.
 */

import logger from '../utils/logger';
import { AssetId, BondBatch, BondId, BondIssuer } from '../types';
import { UnacceptableParams } from '../core/errors';
import { Snapshottable } from '../state/atomic';
import { BondFactory } from './bondFactory';

export interface BondIssuerConfig {
    collateral: AssetId;
    maxMaturityDuration: number;
    minIssueTimeIntervalSec: number;
    issueWindowOffsetSec: number;
    trancheRatios: readonly number[];
}

export interface BondIssuerState {
    issued: BondId[];
    lastIssueWindowTimestamp: number;
}

export class InMemoryBondIssuer implements BondIssuer, Snapshottable<BondIssuerState> {
    private issued: BondId[] = [];
    private lastIssueWindowTimestamp = 0;
    private config: BondIssuerConfig;

    constructor(private readonly factory: BondFactory, config: BondIssuerConfig) {
        InMemoryBondIssuer.assertConfig(config);
        this.config = { ...config, trancheRatios: [...config.trancheRatios] };
    }

    static assertConfig(config: BondIssuerConfig): void {
        if (config.minIssueTimeIntervalSec <= 0 || config.maxMaturityDuration <= 0) {
            throw new UnacceptableParams('issue interval and bond duration must be positive', {
                minIssueTimeIntervalSec: config.minIssueTimeIntervalSec,
                maxMaturityDuration: config.maxMaturityDuration,
            });
        }
        if (config.issueWindowOffsetSec < 0 || config.issueWindowOffsetSec >= config.minIssueTimeIntervalSec) {
            throw new UnacceptableParams('issue window offset must lie inside the issue interval', {
                issueWindowOffsetSec: config.issueWindowOffsetSec,
            });
        }
    }

    get collateral(): AssetId {
        return this.config.collateral;
    }

    get issuedCount(): number {
        return this.issued.length;
    }

    get lastIssueWindow(): number {
        return this.lastIssueWindowTimestamp;
    }

    /**
     * Applies to bonds issued from the next window on.
     */
    updateConfig(patch: Partial<Omit<BondIssuerConfig, 'collateral'>>): void {
        const next = { ...this.config, ...patch };
        InMemoryBondIssuer.assertConfig(next);
        this.config = next;
    }

    canIssue(now: number): boolean {
        return this.issued.length === 0 || now >= this.lastIssueWindowTimestamp + this.config.minIssueTimeIntervalSec;
    }

    /**
     * Issues a bond for the current window. Returns null when this window
     * already has one.
     */
    issue(now: number): BondBatch | null {
        if (!this.canIssue(now)) {
            return null;
        }
        const { minIssueTimeIntervalSec, issueWindowOffsetSec, maxMaturityDuration } = this.config;
        this.lastIssueWindowTimestamp = now - (now % minIssueTimeIntervalSec) + issueWindowOffsetSec;
        const bond = this.factory.createBond(
            this.config.collateral,
            this.config.trancheRatios,
            this.lastIssueWindowTimestamp + maxMaturityDuration,
            now
        );
        this.issued.push(bond.id);
        logger.info(`[ISSUER] ISSUE bond=${bond.id} maturity=${bond.maturity} window=${this.lastIssueWindowTimestamp}`);
        return bond;
    }

    getLastBond(now: number): BondBatch | null {
        this.issue(now);
        const lastId = this.issued[this.issued.length - 1];
        return lastId === undefined ? null : this.factory.getBond(lastId) ?? null;
    }

    isInstance(bondId: BondId): boolean {
        return this.issued.includes(bondId);
    }

    snapshot(): BondIssuerState {
        return { issued: [...this.issued], lastIssueWindowTimestamp: this.lastIssueWindowTimestamp };
    }

    restore(state: BondIssuerState): void {
        this.issued = [...state.issued];
        this.lastIssueWindowTimestamp = state.lastIssueWindowTimestamp;
    }
}
