import { FeePolicy } from '../types';
import { UnacceptableParams } from '../core/errors';

export const FEE_DECIMALS = 8;

export type FeeKind =
    | 'perpMint'
    | 'perpBurn'
    | 'perpRollover'
    | 'vaultMint'
    | 'vaultBurn'
    | 'underlyingToPerpSwap'
    | 'perpToUnderlyingSwap';

export type FeeSchedule = Record<FeeKind, bigint>;

const ZERO_FEES: FeeSchedule = {
    perpMint: 0n,
    perpBurn: 0n,
    perpRollover: 0n,
    vaultMint: 0n,
    vaultBurn: 0n,
    underlyingToPerpSwap: 0n,
    perpToUnderlyingSwap: 0n,
};

/**
 * Fixed percentages, 10^8 == 100%. Rollover may be negative (a reward);
 * every other fee must lie in [0, 100%].
 */
export class StaticFeePolicy implements FeePolicy {
    private schedule: FeeSchedule;

    constructor(schedule: Partial<FeeSchedule> = {}) {
        this.schedule = { ...ZERO_FEES };
        this.update(schedule);
    }

    update(patch: Partial<FeeSchedule>): void {
        const next = { ...this.schedule, ...patch };
        const one = 10n ** BigInt(FEE_DECIMALS);
        for (const [kind, perc] of Object.entries(next)) {
            const lower = kind === 'perpRollover' ? -one : 0n;
            if (perc < lower || perc > one) {
                throw new UnacceptableParams(`fee ${kind} out of range`, { perc: perc.toString() });
            }
        }
        this.schedule = next;
    }

    decimals(): number {
        return FEE_DECIMALS;
    }

    computePerpMintFeePerc(): bigint {
        return this.schedule.perpMint;
    }

    computePerpBurnFeePerc(): bigint {
        return this.schedule.perpBurn;
    }

    computePerpRolloverFeePerc(_claimEquivalent: bigint): bigint {
        return this.schedule.perpRollover;
    }

    computeVaultMintFeePerc(): bigint {
        return this.schedule.vaultMint;
    }

    computeVaultBurnFeePerc(): bigint {
        return this.schedule.vaultBurn;
    }

    computeUnderlyingToPerpSwapFeePerc(): bigint {
        return this.schedule.underlyingToPerpSwap;
    }

    computePerpToUnderlyingSwapFeePerc(): bigint {
        return this.schedule.perpToUnderlyingSwap;
    }
}
