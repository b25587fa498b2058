/**
 * AMM error taxonomy. Errors are never retried; an operation that raises one
 * leaves no state behind.
 */

export type AmmErrorCode =
    | 'Expired'
    | 'IdenticalAssets'
    | 'NullIdentity'
    | 'InsufficientAmount'
    | 'InsufficientMinAmount'
    | 'InsufficientAAmount'
    | 'InsufficientBAmount'
    | 'PairNotFound'
    | 'InsufficientShareBalance'
    | 'InsufficientOutputAmount'
    | 'InsufficientInputAmount'
    | 'InvalidPath'
    | 'EmptyReserves'
    | 'EmptyPool'
    | 'InsufficientLiquidityMinted'
    | 'InsufficientLiquidity'
    | 'InvariantViolation'
    | 'Locked';

const DEFAULT_MESSAGES: Record<AmmErrorCode, string> = {
    Expired: 'Deadline has passed',
    IdenticalAssets: 'Assets must be different',
    NullIdentity: 'Identity must not be empty',
    InsufficientAmount: 'Amount must be positive',
    InsufficientMinAmount: 'Desired amount is below its minimum',
    InsufficientAAmount: 'Optimal amount of asset A is below its minimum',
    InsufficientBAmount: 'Optimal amount of asset B is below its minimum',
    PairNotFound: 'Pair does not exist',
    InsufficientShareBalance: 'Share balance too low',
    InsufficientOutputAmount: 'Output amount below minimum',
    InsufficientInputAmount: 'Required input exceeds maximum',
    InvalidPath: 'Path must contain exactly two assets',
    EmptyReserves: 'Reserves are empty',
    EmptyPool: 'Pool holds no reserve of the base asset',
    InsufficientLiquidityMinted: 'Deposit mints no shares',
    InsufficientLiquidity: 'Not enough liquidity for this amount',
    InvariantViolation: 'Constant product invariant violated',
    Locked: 'Pair is locked by an operation in progress',
};

export class AmmError extends Error {
    readonly code: AmmErrorCode;

    constructor(code: AmmErrorCode, message: string = DEFAULT_MESSAGES[code]) {
        super(message);
        this.name = 'AmmError';
        this.code = code;
    }
}

export function isAmmError(error: unknown, code?: AmmErrorCode): error is AmmError {
    return error instanceof AmmError && (code === undefined || error.code === code);
}
