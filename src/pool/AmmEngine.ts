/**
 * AMM Engine - constant product pools over a token ledger
 *
 * Formula: x * y = k
 * Fee: 0.3% (kept in the pool)
 *
 * Every public mutation runs as one atomic step:
 *   1. validate (no state touched)
 *   2. mutate the Pair under its lock
 *   3. check allowances and balances, then move tokens through the ledger
 * A ledger failure in step 3 undoes the transfers already made and restores
 * the Pair snapshot before the error reaches the caller.
 */

import { EventEmitter } from 'events';
import { AmmError } from './errors.js';
import { getAmountIn, getAmountOut, min, quote, scaledPrice, sqrt } from './math.js';
import {
    adjustReserve,
    clonePair,
    creditShares,
    debitShares,
    reserveOf,
    reservesFor,
    restorePair,
    shareBalance,
} from './Pair.js';
import type { Pair, PairKey } from './Pair.js';
import { PairRegistry, canonicalKey } from './PairRegistry.js';
import { LedgerError } from '../ledger/index.js';
import type { TokenLedger } from '../ledger/index.js';
import { PairLocks } from '../security/transaction-guard.js';
import { logger } from '../utils/logger.js';

const log = logger.child('AMM');

// ========== INTERFACES ==========

export interface AddLiquidityParams {
    sender: string;
    assetA: string;
    assetB: string;
    amountADesired: bigint;
    amountBDesired: bigint;
    amountAMin: bigint;
    amountBMin: bigint;
    to: string;
    deadline: number;          // unix seconds
}

export interface AddLiquidityResult {
    pairKey: PairKey;
    amountA: bigint;
    amountB: bigint;
    shares: bigint;
}

export interface RemoveLiquidityParams {
    sender: string;
    assetA: string;
    assetB: string;
    shares: bigint;
    amountAMin: bigint;
    amountBMin: bigint;
    to: string;
    deadline: number;
}

export interface RemoveLiquidityResult {
    pairKey: PairKey;
    amountA: bigint;
    amountB: bigint;
}

export interface SwapExactInParams {
    sender: string;
    amountIn: bigint;
    amountOutMin: bigint;
    path: readonly string[];
    to: string;
    deadline: number;
}

export interface SwapExactOutParams {
    sender: string;
    amountOut: bigint;
    amountInMax: bigint;
    path: readonly string[];
    to: string;
    deadline: number;
}

// [amountIn, amountOut]
export type SwapAmounts = [bigint, bigint];

export interface LiquidityAddedEvent {
    pairKey: PairKey;
    provider: string;
    to: string;
    assetA: string;
    assetB: string;
    amountA: bigint;
    amountB: bigint;
    shares: bigint;
}

export interface LiquidityRemovedEvent {
    pairKey: PairKey;
    provider: string;
    to: string;
    assetA: string;
    assetB: string;
    amountA: bigint;
    amountB: bigint;
    shares: bigint;
}

export interface TokensSwappedEvent {
    pairKey: PairKey;
    sender: string;
    to: string;
    assetIn: string;
    assetOut: string;
    amountIn: bigint;
    amountOut: bigint;
}

export interface AmmEventMap {
    LiquidityAdded: LiquidityAddedEvent;
    LiquidityRemoved: LiquidityRemovedEvent;
    TokensSwapped: TokensSwappedEvent;
}

export interface AmmEngineOptions {
    ledger: TokenLedger;
    registry?: PairRegistry;
    // Ledger identity holding pool custody
    poolAccount?: string;
    // Current time in unix seconds
    clock?: () => number;
}

type Transfer =
    | { kind: 'pull'; asset: string; from: string; amount: bigint }
    | { kind: 'push'; asset: string; to: string; amount: bigint };

function systemClock(): number {
    return Math.floor(Date.now() / 1000);
}

function isNullIdentity(identity: string): boolean {
    return identity.trim() === '';
}

// ========== ENGINE ==========

export class AmmEngine {
    readonly registry: PairRegistry;
    readonly poolAccount: string;
    private ledger: TokenLedger;
    private clock: () => number;
    private events = new EventEmitter();
    private locks = new PairLocks();

    constructor(options: AmmEngineOptions) {
        this.ledger = options.ledger;
        this.registry = options.registry ?? new PairRegistry();
        this.poolAccount = options.poolAccount ?? 'pool';
        this.clock = options.clock ?? systemClock;
    }

    // ========== EVENTS ==========

    on<K extends keyof AmmEventMap>(event: K, listener: (payload: AmmEventMap[K]) => void): this {
        this.events.on(event, listener);
        return this;
    }

    off<K extends keyof AmmEventMap>(event: K, listener: (payload: AmmEventMap[K]) => void): this {
        this.events.off(event, listener);
        return this;
    }

    /**
     * Runs after commit. A failing listener is logged and the rest still run.
     */
    private emit<K extends keyof AmmEventMap>(event: K, payload: AmmEventMap[K]): void {
        for (const listener of this.events.listeners(event)) {
            try {
                Reflect.apply(listener, undefined, [payload]);
            } catch (error) {
                log.error(`${event} listener failed:`, error);
            }
        }
    }

    // ========== ADD LIQUIDITY ==========

    /**
     * Deposit both assets and mint shares to `to`.
     * The first deposit into an empty pair sets its price.
     */
    addLiquidity(params: AddLiquidityParams): AddLiquidityResult {
        const { sender, assetA, assetB, amountADesired, amountBDesired, amountAMin, amountBMin, to } = params;

        const now = this.requireDeadline(params.deadline);
        this.requireAssets(assetA, assetB);
        this.requireIdentities(sender, to);
        if (amountADesired <= 0n || amountBDesired <= 0n) {
            throw new AmmError('InsufficientAmount');
        }
        if (amountADesired < amountAMin || amountBDesired < amountBMin) {
            throw new AmmError('InsufficientMinAmount');
        }

        const key = canonicalKey(assetA, assetB);
        const result = this.locks.withPairLock(key, (): AddLiquidityResult => {
            const { pair, created } = this.registry.getOrCreate(assetA, assetB, now);
            const snapshot = clonePair(pair);

            return this.atomically(pair, snapshot, created, () => {
                const [reserveA, reserveB] = reservesFor(pair, assetA);
                let amountA: bigint;
                let amountB: bigint;
                let shares: bigint;

                if (pair.totalShares === 0n) {
                    amountA = amountADesired;
                    amountB = amountBDesired;
                    shares = sqrt(amountA * amountB);
                } else {
                    [amountA, amountB] = this.optimalDeposit(
                        amountADesired, amountBDesired, amountAMin, amountBMin, reserveA, reserveB
                    );
                    shares = min(
                        (amountA * pair.totalShares) / reserveA,
                        (amountB * pair.totalShares) / reserveB
                    );
                }

                if (shares === 0n) {
                    throw new AmmError('InsufficientLiquidityMinted');
                }

                adjustReserve(pair, assetA, amountA);
                adjustReserve(pair, assetB, amountB);
                creditShares(pair, to, shares);
                pair.updatedAt = now;

                this.settle([
                    { kind: 'pull', asset: assetA, from: sender, amount: amountA },
                    { kind: 'pull', asset: assetB, from: sender, amount: amountB },
                ]);

                log.info(`➕ Liquidity added: ${amountA} ${assetA} + ${amountB} ${assetB} = ${shares} shares`);
                return { pairKey: pair.key, amountA, amountB, shares };
            });
        });

        this.emit('LiquidityAdded', {
            pairKey: result.pairKey,
            provider: sender,
            to,
            assetA,
            assetB,
            amountA: result.amountA,
            amountB: result.amountB,
            shares: result.shares,
        });
        return result;
    }

    /**
     * Amounts that keep the reserve ratio. The B side is tried first.
     */
    private optimalDeposit(
        amountADesired: bigint,
        amountBDesired: bigint,
        amountAMin: bigint,
        amountBMin: bigint,
        reserveA: bigint,
        reserveB: bigint
    ): [bigint, bigint] {
        const optimalB = quote(amountADesired, reserveA, reserveB);
        if (optimalB <= amountBDesired) {
            if (optimalB < amountBMin) {
                throw new AmmError('InsufficientBAmount');
            }
            return [amountADesired, optimalB];
        }

        const optimalA = quote(amountBDesired, reserveB, reserveA);
        if (optimalA > amountADesired || optimalA < amountAMin) {
            throw new AmmError('InsufficientAAmount');
        }
        return [optimalA, amountBDesired];
    }

    // ========== REMOVE LIQUIDITY ==========

    /**
     * Burn the sender's shares and pay the proportional reserves to `to`
     */
    removeLiquidity(params: RemoveLiquidityParams): RemoveLiquidityResult {
        const { sender, assetA, assetB, shares, amountAMin, amountBMin, to } = params;

        const now = this.requireDeadline(params.deadline);
        this.requireAssets(assetA, assetB);
        this.requireIdentities(sender, to);
        if (shares <= 0n) {
            throw new AmmError('InsufficientAmount');
        }

        const key = canonicalKey(assetA, assetB);
        const result = this.locks.withPairLock(key, (): RemoveLiquidityResult => {
            const pair = this.registry.getExisting(assetA, assetB);
            const balance = shareBalance(pair, sender);
            if (balance < shares) {
                throw new AmmError('InsufficientShareBalance', `Share balance ${balance} is below ${shares}`);
            }

            // Computed from reserves before mutation
            const [reserveA, reserveB] = reservesFor(pair, assetA);
            const amountA = (shares * reserveA) / pair.totalShares;
            const amountB = (shares * reserveB) / pair.totalShares;
            if (amountA < amountAMin || amountB < amountBMin) {
                throw new AmmError('InsufficientOutputAmount');
            }

            const snapshot = clonePair(pair);
            return this.atomically(pair, snapshot, false, () => {
                adjustReserve(pair, assetA, -amountA);
                adjustReserve(pair, assetB, -amountB);
                debitShares(pair, sender, shares);
                pair.updatedAt = now;

                this.settle([
                    { kind: 'push', asset: assetA, to, amount: amountA },
                    { kind: 'push', asset: assetB, to, amount: amountB },
                ]);

                log.info(`➖ Liquidity removed: ${shares} shares → ${amountA} ${assetA} + ${amountB} ${assetB}`);
                return { pairKey: pair.key, amountA, amountB };
            });
        });

        this.emit('LiquidityRemoved', {
            pairKey: result.pairKey,
            provider: sender,
            to,
            assetA,
            assetB,
            amountA: result.amountA,
            amountB: result.amountB,
            shares,
        });
        return result;
    }

    // ========== SWAP ==========

    /**
     * Sell exactly `amountIn` of path[0] for as much of path[1] as the pool gives
     */
    swapExactTokensForTokens(params: SwapExactInParams): SwapAmounts {
        const { sender, amountIn, amountOutMin, path, to } = params;

        const now = this.requireDeadline(params.deadline);
        const [assetIn, assetOut] = this.requirePath(path);
        if (amountIn <= 0n) {
            throw new AmmError('InsufficientAmount');
        }
        this.requireIdentities(sender, to);
        this.requireAssets(assetIn, assetOut);

        return this.executeSwap(sender, to, assetIn, assetOut, now, (reserveIn, reserveOut) => {
            const amountOut = getAmountOut(amountIn, reserveIn, reserveOut);
            if (amountOut < amountOutMin) {
                throw new AmmError(
                    'InsufficientOutputAmount',
                    `Slippage exceeded. Expected min: ${amountOutMin}, got: ${amountOut}`
                );
            }
            return [amountIn, amountOut];
        });
    }

    /**
     * Buy exactly `amountOut` of path[1], paying at most `amountInMax` of path[0]
     */
    swapTokensForExactTokens(params: SwapExactOutParams): SwapAmounts {
        const { sender, amountOut, amountInMax, path, to } = params;

        const now = this.requireDeadline(params.deadline);
        const [assetIn, assetOut] = this.requirePath(path);
        if (amountOut <= 0n) {
            throw new AmmError('InsufficientAmount');
        }
        this.requireIdentities(sender, to);
        this.requireAssets(assetIn, assetOut);

        return this.executeSwap(sender, to, assetIn, assetOut, now, (reserveIn, reserveOut) => {
            const amountIn = getAmountIn(amountOut, reserveIn, reserveOut);
            if (amountIn > amountInMax) {
                throw new AmmError(
                    'InsufficientInputAmount',
                    `Slippage exceeded. Expected max: ${amountInMax}, needs: ${amountIn}`
                );
            }
            return [amountIn, amountOut];
        });
    }

    private executeSwap(
        sender: string,
        to: string,
        assetIn: string,
        assetOut: string,
        now: number,
        price: (reserveIn: bigint, reserveOut: bigint) => SwapAmounts
    ): SwapAmounts {
        const key = canonicalKey(assetIn, assetOut);
        const [amountIn, amountOut] = this.locks.withPairLock(key, (): SwapAmounts => {
            const pair = this.registry.getExisting(assetIn, assetOut);
            const [reserveIn, reserveOut] = reservesFor(pair, assetIn);
            const [amountInPaid, amountOutPaid] = price(reserveIn, reserveOut);

            const snapshot = clonePair(pair);
            const kBefore = pair.reserveLow * pair.reserveHigh;

            return this.atomically(pair, snapshot, false, (): SwapAmounts => {
                adjustReserve(pair, assetIn, amountInPaid);
                adjustReserve(pair, assetOut, -amountOutPaid);

                // Verify invariant: k may only grow (fee stays in the pool)
                if (reserveOf(pair, assetOut) < 0n) {
                    throw new AmmError('InvariantViolation', 'Output reserve would go negative');
                }
                const kAfter = pair.reserveLow * pair.reserveHigh;
                if (kAfter < kBefore) {
                    throw new AmmError('InvariantViolation', `k decreased: ${kAfter} < ${kBefore}`);
                }
                pair.updatedAt = now;

                this.settle([
                    { kind: 'pull', asset: assetIn, from: sender, amount: amountInPaid },
                    { kind: 'push', asset: assetOut, to, amount: amountOutPaid },
                ]);

                log.info(`💱 Swap: ${amountInPaid} ${assetIn} → ${amountOutPaid} ${assetOut}`);
                return [amountInPaid, amountOutPaid];
            });
        });

        this.emit('TokensSwapped', {
            pairKey: key,
            sender,
            to,
            assetIn,
            assetOut,
            amountIn,
            amountOut,
        });
        return [amountIn, amountOut];
    }

    // ========== QUERIES ==========

    /**
     * Price of one unit of `assetA` in units of `assetB`, scaled by PRICE_SCALE
     */
    getPrice(assetA: string, assetB: string): bigint {
        const pair = this.registry.getExisting(assetA, assetB);
        return scaledPrice(reserveOf(pair, assetA), reserveOf(pair, assetB));
    }

    getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
        return getAmountOut(amountIn, reserveIn, reserveOut);
    }

    getAmountIn(amountOut: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
        return getAmountIn(amountOut, reserveIn, reserveOut);
    }

    quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
        return quote(amountA, reserveA, reserveB);
    }

    /**
     * Reserves ordered as the arguments are
     */
    getReserves(assetA: string, assetB: string): { reserveA: bigint; reserveB: bigint } {
        const pair = this.registry.getExisting(assetA, assetB);
        const [reserveA, reserveB] = reservesFor(pair, assetA);
        return { reserveA, reserveB };
    }

    getShareBalance(assetA: string, assetB: string, owner: string): bigint {
        const pair = this.registry.find(assetA, assetB);
        return pair ? shareBalance(pair, owner) : 0n;
    }

    getPair(assetA: string, assetB: string): Pair | undefined {
        const pair = this.registry.find(assetA, assetB);
        return pair ? clonePair(pair) : undefined;
    }

    listPairs(): Pair[] {
        return this.registry.list().map(clonePair);
    }

    // ========== ATOMICITY ==========

    /**
     * Run `fn` against `pair`; on any error restore the snapshot (and drop the
     * pair again if this call created it) before rethrowing.
     */
    private atomically<T>(pair: Pair, snapshot: Pair, created: boolean, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            restorePair(pair, snapshot);
            if (created) {
                this.registry.evict(pair.key);
            }
            log.warn(`Rolled back ${pair.assetLow}/${pair.assetHigh}: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }
    }

    /**
     * Perform transfers in order. Allowances and balances are checked up
     * front; if a transfer still fails, those already done are reversed.
     */
    private settle(transfers: Transfer[]): void {
        for (const transfer of transfers) {
            if (transfer.amount !== 0n) this.preflight(transfer);
        }

        const done: Transfer[] = [];
        try {
            for (const transfer of transfers) {
                if (transfer.amount === 0n) continue;
                this.execute(transfer);
                done.push(transfer);
            }
        } catch (error) {
            for (const transfer of done.reverse()) {
                this.revert(transfer);
            }
            throw error;
        }
    }

    private preflight(transfer: Transfer): void {
        const holder = transfer.kind === 'pull' ? transfer.from : this.poolAccount;
        if (transfer.kind === 'pull') {
            const allowed = this.ledger.allowance(transfer.asset, holder, this.poolAccount);
            if (allowed < transfer.amount) {
                throw new LedgerError(
                    'InsufficientAllowance',
                    `Allowance of ${this.poolAccount} on ${transfer.asset} is ${allowed}, needs ${transfer.amount}`
                );
            }
        }
        const balance = this.ledger.balanceOf(transfer.asset, holder);
        if (balance < transfer.amount) {
            throw new LedgerError(
                'InsufficientFunds',
                `Balance of ${holder} on ${transfer.asset} is ${balance}, needs ${transfer.amount}`
            );
        }
    }

    private execute(transfer: Transfer): void {
        if (transfer.kind === 'pull') {
            this.ledger.transferFrom(transfer.asset, this.poolAccount, transfer.from, this.poolAccount, transfer.amount);
        } else {
            this.ledger.transfer(transfer.asset, this.poolAccount, transfer.to, transfer.amount);
        }
    }

    private revert(transfer: Transfer): void {
        if (transfer.kind === 'pull') {
            this.ledger.transfer(transfer.asset, this.poolAccount, transfer.from, transfer.amount);
        } else {
            this.ledger.transfer(transfer.asset, transfer.to, this.poolAccount, transfer.amount);
        }
    }

    // ========== PRECONDITIONS ==========

    private requireDeadline(deadline: number): number {
        const now = this.clock();
        if (deadline < now) {
            throw new AmmError('Expired', `Deadline ${deadline} is before ${now}`);
        }
        return now;
    }

    private requireAssets(assetA: string, assetB: string): void {
        if (assetA === assetB) {
            throw new AmmError('IdenticalAssets');
        }
        if (isNullIdentity(assetA) || isNullIdentity(assetB)) {
            throw new AmmError('NullIdentity', 'Asset identifier must not be empty');
        }
    }

    private requireIdentities(sender: string, to: string): void {
        if (isNullIdentity(to)) {
            throw new AmmError('NullIdentity', 'Recipient must not be empty');
        }
        if (isNullIdentity(sender)) {
            throw new AmmError('NullIdentity', 'Sender must not be empty');
        }
    }

    private requirePath(path: readonly string[]): [string, string] {
        const [assetIn, assetOut] = path;
        if (path.length !== 2 || assetIn === undefined || assetOut === undefined) {
            throw new AmmError('InvalidPath', `Path must contain exactly two assets, got ${path.length}`);
        }
        return [assetIn, assetOut];
    }
}
