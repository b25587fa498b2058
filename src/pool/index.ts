/**
 * Pool Module Exports
 */

export { AmmEngine } from './AmmEngine.js';
export type {
    AmmEngineOptions,
    AmmEventMap,
    AddLiquidityParams,
    AddLiquidityResult,
    RemoveLiquidityParams,
    RemoveLiquidityResult,
    SwapExactInParams,
    SwapExactOutParams,
    SwapAmounts,
    LiquidityAddedEvent,
    LiquidityRemovedEvent,
    TokensSwappedEvent,
} from './AmmEngine.js';

export { PairRegistry, canonicalKey, sortAssets } from './PairRegistry.js';
export type { RegistryData } from './PairRegistry.js';

export { pairToData, pairFromData, shareBalance, reserveOf } from './Pair.js';
export type { Pair, PairData, PairKey } from './Pair.js';

export { AmmError, isAmmError } from './errors.js';
export type { AmmErrorCode } from './errors.js';

export {
    FEE_MULTIPLIER,
    FEE_DENOMINATOR,
    PRICE_SCALE,
    sqrt,
    quote,
    getAmountOut,
    getAmountIn,
    scaledPrice,
} from './math.js';
