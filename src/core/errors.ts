/**
 * Ledger error taxonomy.
 *
 * Every error is fatal to the current call: the atomic executor restores
 * the pre-call state and rethrows. Nothing is retried here.
 */

export type LedgerErrorKind =
    | 'UnacceptableBond'
    | 'UnacceptableDeposit'
    | 'UnacceptableRedemption'
    | 'UnacceptableRollover'
    | 'InsufficientDeployment'
    | 'DeployedCountOverLimit'
    | 'UnexpectedAsset'
    | 'UnacceptableParams'
    | 'LiquidityOutOfBounds'
    | 'InsufficientBalance'
    | 'ImmatureBond'
    | 'ReentrantCall';

export class LedgerError extends Error {
    constructor(
        public readonly kind: LedgerErrorKind,
        public readonly reason: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(`[${kind}] ${reason}`);
        this.name = kind;
    }
}

export class UnacceptableBond extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('UnacceptableBond', reason, context);
    }
}

export class UnacceptableDeposit extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('UnacceptableDeposit', reason, context);
    }
}

export class UnacceptableRedemption extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('UnacceptableRedemption', reason, context);
    }
}

export class UnacceptableRollover extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('UnacceptableRollover', reason, context);
    }
}

export class InsufficientDeployment extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('InsufficientDeployment', reason, context);
    }
}

export class DeployedCountOverLimit extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('DeployedCountOverLimit', reason, context);
    }
}

export class UnexpectedAsset extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('UnexpectedAsset', reason, context);
    }
}

export class UnacceptableParams extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('UnacceptableParams', reason, context);
    }
}

export class LiquidityOutOfBounds extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('LiquidityOutOfBounds', reason, context);
    }
}

export class InsufficientBalance extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('InsufficientBalance', reason, context);
    }
}

export class ImmatureBond extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('ImmatureBond', reason, context);
    }
}

export class ReentrantCall extends LedgerError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('ReentrantCall', reason, context);
    }
}

export function isLedgerError(err: unknown): err is LedgerError {
    return err instanceof LedgerError;
}
