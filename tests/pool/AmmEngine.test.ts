import { describe, it, expect, beforeEach } from 'vitest';
import { AmmEngine } from '../../src/pool/AmmEngine.js';
import type { LiquidityAddedEvent, TokensSwappedEvent } from '../../src/pool/AmmEngine.js';
import { AmmError } from '../../src/pool/errors.js';
import { PRICE_SCALE } from '../../src/pool/math.js';
import { InMemoryTokenLedger, LedgerError } from '../../src/ledger/index.js';

const NOW = 1_700_000_000;
const DEADLINE = NOW + 60;
const UNLIMITED = 10n ** 30n;

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        if (error instanceof AmmError || error instanceof LedgerError) return error.code;
        throw error;
    }
    return undefined;
}

/**
 * Ledger whose transfers can be made to fail or to call back into the engine
 */
class ScriptedLedger extends InMemoryTokenLedger {
    failTransferFrom?: string;
    failTransfer?: string;
    onPull?: () => void;

    transfer(asset: string, from: string, to: string, amount: bigint): void {
        if (asset === this.failTransfer) throw new Error(`ledger offline for ${asset}`);
        super.transfer(asset, from, to, amount);
    }

    transferFrom(asset: string, spender: string, from: string, to: string, amount: bigint): void {
        this.onPull?.();
        if (asset === this.failTransferFrom) throw new Error(`ledger offline for ${asset}`);
        super.transferFrom(asset, spender, from, to, amount);
    }
}

function fund(ledger: InMemoryTokenLedger, owner: string, a: bigint, b: bigint): void {
    ledger.mint('A', owner, a);
    ledger.mint('B', owner, b);
    ledger.approve('A', owner, 'pool', UNLIMITED);
    ledger.approve('B', owner, 'pool', UNLIMITED);
}

describe('AmmEngine', () => {
    let ledger: ScriptedLedger;
    let engine: AmmEngine;

    function seed(amountA: bigint = 1000n, amountB: bigint = 4000n) {
        return engine.addLiquidity({
            sender: 'alice',
            assetA: 'A',
            assetB: 'B',
            amountADesired: amountA,
            amountBDesired: amountB,
            amountAMin: 0n,
            amountBMin: 0n,
            to: 'alice',
            deadline: DEADLINE,
        });
    }

    function swapAForB(amountIn: bigint, amountOutMin: bigint = 0n, sender = 'alice', to = 'bob') {
        return engine.swapExactTokensForTokens({
            sender,
            amountIn,
            amountOutMin,
            path: ['A', 'B'],
            to,
            deadline: DEADLINE,
        });
    }

    beforeEach(() => {
        ledger = new ScriptedLedger();
        engine = new AmmEngine({ ledger, clock: () => NOW });
        fund(ledger, 'alice', 10_000n, 40_000n);
    });

    describe('addLiquidity', () => {
        it('mints sqrt(a*b) shares for the first deposit', () => {
            const result = seed();

            expect(result.amountA).toBe(1000n);
            expect(result.amountB).toBe(4000n);
            expect(result.shares).toBe(2000n);
            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1000n, reserveB: 4000n });
            expect(engine.getShareBalance('A', 'B', 'alice')).toBe(2000n);
            expect(ledger.balanceOf('A', 'alice')).toBe(9000n);
            expect(ledger.balanceOf('B', 'alice')).toBe(36_000n);
            expect(ledger.balanceOf('A', 'pool')).toBe(1000n);
            expect(ledger.balanceOf('B', 'pool')).toBe(4000n);
        });

        it('sets the price from the first deposit', () => {
            seed();
            expect(engine.getPrice('A', 'B')).toBe(4n * PRICE_SCALE);
            expect(engine.getPrice('B', 'A')).toBe(250_000_000_000_000_000n);
        });

        it('takes desired A and the matching B when B is the slack side', () => {
            seed();
            fund(ledger, 'bob', 500n, 3000n);

            const result = engine.addLiquidity({
                sender: 'bob', assetA: 'A', assetB: 'B',
                amountADesired: 500n, amountBDesired: 3000n, amountAMin: 0n, amountBMin: 0n,
                to: 'bob', deadline: DEADLINE,
            });

            expect(result.amountA).toBe(500n);
            expect(result.amountB).toBe(2000n);
            expect(result.shares).toBe(1000n);
            expect(ledger.balanceOf('B', 'bob')).toBe(1000n);
        });

        it('takes desired B and the matching A when A is the slack side', () => {
            seed();
            fund(ledger, 'bob', 500n, 1000n);

            const result = engine.addLiquidity({
                sender: 'bob', assetA: 'A', assetB: 'B',
                amountADesired: 500n, amountBDesired: 1000n, amountAMin: 0n, amountBMin: 0n,
                to: 'bob', deadline: DEADLINE,
            });

            expect(result.amountA).toBe(250n);
            expect(result.amountB).toBe(1000n);
            expect(result.shares).toBe(500n);
        });

        it('accepts the assets in either order', () => {
            seed();
            fund(ledger, 'bob', 500n, 2000n);

            const result = engine.addLiquidity({
                sender: 'bob', assetA: 'B', assetB: 'A',
                amountADesired: 2000n, amountBDesired: 500n, amountAMin: 0n, amountBMin: 0n,
                to: 'bob', deadline: DEADLINE,
            });

            expect(result.amountA).toBe(2000n);
            expect(result.amountB).toBe(500n);
            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1500n, reserveB: 6000n });
        });

        it('enforces the minimum on the computed side', () => {
            seed();
            fund(ledger, 'bob', 500n, 3000n);
            const base = {
                sender: 'bob', assetA: 'A', assetB: 'B', to: 'bob', deadline: DEADLINE,
            };

            expect(codeOf(() => engine.addLiquidity({
                ...base, amountADesired: 500n, amountBDesired: 3000n, amountAMin: 0n, amountBMin: 2500n,
            }))).toBe('InsufficientBAmount');
            expect(codeOf(() => engine.addLiquidity({
                ...base, amountADesired: 500n, amountBDesired: 1000n, amountAMin: 300n, amountBMin: 0n,
            }))).toBe('InsufficientAAmount');
            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1000n, reserveB: 4000n });
        });

        it('rejects a deposit that mints no shares', () => {
            ledger.mint('A', 'alice', 1_000_000n);
            seed(1_000_000n, 1n);
            expect(engine.getPair('A', 'B')?.totalShares).toBe(1000n);

            expect(codeOf(() => engine.addLiquidity({
                sender: 'alice', assetA: 'A', assetB: 'B',
                amountADesired: 1n, amountBDesired: 1n, amountAMin: 0n, amountBMin: 0n,
                to: 'alice', deadline: DEADLINE,
            }))).toBe('InsufficientLiquidityMinted');
            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1_000_000n, reserveB: 1n });
        });

        it('checks preconditions in order', () => {
            const params = {
                sender: 'alice', assetA: 'A', assetB: 'A',
                amountADesired: 0n, amountBDesired: 0n, amountAMin: 0n, amountBMin: 0n,
                to: '', deadline: NOW - 1,
            };
            expect(codeOf(() => engine.addLiquidity(params))).toBe('Expired');
            expect(codeOf(() => engine.addLiquidity({ ...params, deadline: NOW }))).toBe('IdenticalAssets');
            expect(codeOf(() => engine.addLiquidity({ ...params, deadline: NOW, assetB: ' ' }))).toBe('NullIdentity');
            expect(codeOf(() => engine.addLiquidity({ ...params, deadline: NOW, assetB: 'B' }))).toBe('NullIdentity');
            expect(codeOf(() => engine.addLiquidity({ ...params, deadline: NOW, assetB: 'B', to: 'alice' })))
                .toBe('InsufficientAmount');
            expect(codeOf(() => engine.addLiquidity({
                ...params, deadline: NOW, assetB: 'B', to: 'alice',
                amountADesired: 10n, amountBDesired: 10n, amountAMin: 11n,
            }))).toBe('InsufficientMinAmount');
            expect(engine.registry.size).toBe(0);
        });

        it('leaves no trace when the deadline has passed', () => {
            expect(codeOf(() => engine.addLiquidity({
                sender: 'alice', assetA: 'A', assetB: 'B',
                amountADesired: 1000n, amountBDesired: 4000n, amountAMin: 0n, amountBMin: 0n,
                to: 'alice', deadline: NOW - 1,
            }))).toBe('Expired');
            expect(engine.getPair('A', 'B')).toBeUndefined();
            expect(ledger.balanceOf('A', 'alice')).toBe(10_000n);
        });

        it('keeps pools apart for identifiers that join to the same string', () => {
            for (const asset of ['a', 'b\u0000c', 'a\u0000b', 'c']) {
                ledger.mint(asset, 'alice', 100n);
                ledger.approve(asset, 'alice', 'pool', UNLIMITED);
            }
            const first = engine.addLiquidity({
                sender: 'alice', assetA: 'a', assetB: 'b\u0000c',
                amountADesired: 100n, amountBDesired: 100n, amountAMin: 0n, amountBMin: 0n,
                to: 'alice', deadline: DEADLINE,
            });
            const second = engine.addLiquidity({
                sender: 'alice', assetA: 'a\u0000b', assetB: 'c',
                amountADesired: 100n, amountBDesired: 25n, amountAMin: 0n, amountBMin: 0n,
                to: 'alice', deadline: DEADLINE,
            });

            expect(second.pairKey).not.toBe(first.pairKey);
            expect(second.shares).toBe(50n);
            expect(engine.registry.size).toBe(2);
            expect(engine.getReserves('c', 'a\u0000b')).toEqual({ reserveA: 25n, reserveB: 100n });
            expect(engine.getReserves('a', 'b\u0000c')).toEqual({ reserveA: 100n, reserveB: 100n });
        });
    });

    describe('removeLiquidity', () => {
        it('returns the full deposit when every share is burned', () => {
            seed();
            const result = engine.removeLiquidity({
                sender: 'alice', assetA: 'A', assetB: 'B', shares: 2000n,
                amountAMin: 0n, amountBMin: 0n, to: 'alice', deadline: DEADLINE,
            });

            expect(result.amountA).toBe(1000n);
            expect(result.amountB).toBe(4000n);
            expect(ledger.balanceOf('A', 'alice')).toBe(10_000n);
            expect(ledger.balanceOf('B', 'alice')).toBe(40_000n);

            const pair = engine.getPair('A', 'B');
            expect(pair?.totalShares).toBe(0n);
            expect(pair?.reserveLow).toBe(0n);
            expect(pair?.reserveHigh).toBe(0n);
            expect(codeOf(() => engine.getPrice('A', 'B'))).toBe('EmptyPool');
        });

        it('pays a proportional share rounded down', () => {
            seed();
            const result = engine.removeLiquidity({
                sender: 'alice', assetA: 'B', assetB: 'A', shares: 3n,
                amountAMin: 0n, amountBMin: 0n, to: 'carol', deadline: DEADLINE,
            });

            // 3 * 4000 / 2000 and 3 * 1000 / 2000
            expect(result.amountA).toBe(6n);
            expect(result.amountB).toBe(1n);
            expect(ledger.balanceOf('B', 'carol')).toBe(6n);
            expect(ledger.balanceOf('A', 'carol')).toBe(1n);
            expect(engine.getShareBalance('A', 'B', 'alice')).toBe(1997n);
        });

        it('fails with PairNotFound for a pair that never existed', () => {
            expect(codeOf(() => engine.removeLiquidity({
                sender: 'alice', assetA: 'A', assetB: 'C', shares: 1n,
                amountAMin: 0n, amountBMin: 0n, to: 'alice', deadline: DEADLINE,
            }))).toBe('PairNotFound');
            expect(engine.registry.size).toBe(0);
        });

        it('rejects burning more shares than owned', () => {
            seed();
            expect(codeOf(() => engine.removeLiquidity({
                sender: 'bob', assetA: 'A', assetB: 'B', shares: 1n,
                amountAMin: 0n, amountBMin: 0n, to: 'bob', deadline: DEADLINE,
            }))).toBe('InsufficientShareBalance');
        });

        it('enforces minimum outputs', () => {
            seed();
            expect(codeOf(() => engine.removeLiquidity({
                sender: 'alice', assetA: 'A', assetB: 'B', shares: 1000n,
                amountAMin: 501n, amountBMin: 0n, to: 'alice', deadline: DEADLINE,
            }))).toBe('InsufficientOutputAmount');
            expect(engine.getShareBalance('A', 'B', 'alice')).toBe(2000n);
        });

        it('fails with Expired and leaves the pool untouched', () => {
            seed();
            expect(codeOf(() => engine.removeLiquidity({
                sender: 'alice', assetA: 'A', assetB: 'B', shares: 1000n,
                amountAMin: 0n, amountBMin: 0n, to: 'alice', deadline: NOW - 1,
            }))).toBe('Expired');

            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1000n, reserveB: 4000n });
            expect(engine.getShareBalance('A', 'B', 'alice')).toBe(2000n);
            expect(ledger.balanceOf('A', 'alice')).toBe(9000n);
            expect(ledger.balanceOf('B', 'alice')).toBe(36_000n);
        });

        it('rejects zero shares before looking up the pair', () => {
            expect(codeOf(() => engine.removeLiquidity({
                sender: 'alice', assetA: 'A', assetB: 'C', shares: 0n,
                amountAMin: 0n, amountBMin: 0n, to: 'alice', deadline: DEADLINE,
            }))).toBe('InsufficientAmount');
        });

        it('never returns more than a later provider deposited', () => {
            seed();
            swapAForB(250n);
            fund(ledger, 'bob', 777n, 5000n);

            const added = engine.addLiquidity({
                sender: 'bob', assetA: 'A', assetB: 'B',
                amountADesired: 777n, amountBDesired: 5000n, amountAMin: 0n, amountBMin: 0n,
                to: 'bob', deadline: DEADLINE,
            });
            const removed = engine.removeLiquidity({
                sender: 'bob', assetA: 'A', assetB: 'B', shares: added.shares,
                amountAMin: 0n, amountBMin: 0n, to: 'bob', deadline: DEADLINE,
            });

            expect(removed.amountA).toBeLessThanOrEqual(added.amountA);
            expect(removed.amountB).toBeLessThanOrEqual(added.amountB);
        });
    });

    describe('swapExactTokensForTokens', () => {
        it('swaps 100 A for 362 B', () => {
            seed();
            const amounts = swapAForB(100n);

            expect(amounts).toEqual([100n, 362n]);
            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1100n, reserveB: 3638n });
            expect(ledger.balanceOf('A', 'alice')).toBe(8900n);
            expect(ledger.balanceOf('B', 'bob')).toBe(362n);
        });

        it('never decreases the product of reserves', () => {
            seed();
            let k = 1000n * 4000n;
            for (const amount of [1n, 7n, 100n, 999n, 3n]) {
                swapAForB(amount);
                engine.swapExactTokensForTokens({
                    sender: 'alice', amountIn: amount * 3n, amountOutMin: 0n,
                    path: ['B', 'A'], to: 'alice', deadline: DEADLINE,
                });
                const { reserveA, reserveB } = engine.getReserves('A', 'B');
                expect(reserveA * reserveB).toBeGreaterThanOrEqual(k);
                k = reserveA * reserveB;
            }
        });

        it('enforces the minimum output and leaves state untouched', () => {
            seed();
            expect(codeOf(() => swapAForB(100n, 363n))).toBe('InsufficientOutputAmount');
            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1000n, reserveB: 4000n });
            expect(ledger.balanceOf('A', 'alice')).toBe(9000n);
        });

        it('checks preconditions in order', () => {
            const base = { sender: 'alice', amountIn: 10n, amountOutMin: 0n, to: 'bob', deadline: DEADLINE };
            expect(codeOf(() => engine.swapExactTokensForTokens({ ...base, path: ['A'], deadline: NOW - 1 })))
                .toBe('Expired');
            expect(codeOf(() => engine.swapExactTokensForTokens({ ...base, path: ['A', 'B', 'C'] })))
                .toBe('InvalidPath');
            expect(codeOf(() => engine.swapExactTokensForTokens({ ...base, path: ['A', 'B'], amountIn: 0n })))
                .toBe('InsufficientAmount');
            expect(codeOf(() => engine.swapExactTokensForTokens({ ...base, path: ['A', 'B'], to: '' })))
                .toBe('NullIdentity');
            expect(codeOf(() => engine.swapExactTokensForTokens({ ...base, path: ['A', 'A'] })))
                .toBe('IdenticalAssets');
            expect(codeOf(() => engine.swapExactTokensForTokens({ ...base, path: ['A', 'B'] })))
                .toBe('PairNotFound');
        });

        it('fails with EmptyReserves once all liquidity is withdrawn', () => {
            seed();
            engine.removeLiquidity({
                sender: 'alice', assetA: 'A', assetB: 'B', shares: 2000n,
                amountAMin: 0n, amountBMin: 0n, to: 'alice', deadline: DEADLINE,
            });
            expect(codeOf(() => swapAForB(10n))).toBe('EmptyReserves');
        });
    });

    describe('swapTokensForExactTokens', () => {
        it('charges the rounded-up input for an exact output', () => {
            seed();
            const amounts = engine.swapTokensForExactTokens({
                sender: 'alice', amountOut: 362n, amountInMax: 100n,
                path: ['A', 'B'], to: 'bob', deadline: DEADLINE,
            });
            expect(amounts).toEqual([100n, 362n]);
            expect(ledger.balanceOf('B', 'bob')).toBe(362n);
        });

        it('enforces the maximum input', () => {
            seed();
            expect(codeOf(() => engine.swapTokensForExactTokens({
                sender: 'alice', amountOut: 362n, amountInMax: 99n,
                path: ['A', 'B'], to: 'bob', deadline: DEADLINE,
            }))).toBe('InsufficientInputAmount');
        });

        it('fails with Expired and leaves the pool untouched', () => {
            seed();
            expect(codeOf(() => engine.swapTokensForExactTokens({
                sender: 'alice', amountOut: 362n, amountInMax: 100n,
                path: ['A', 'B'], to: 'bob', deadline: NOW - 1,
            }))).toBe('Expired');

            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1000n, reserveB: 4000n });
            expect(ledger.balanceOf('A', 'alice')).toBe(9000n);
            expect(ledger.balanceOf('B', 'bob')).toBe(0n);
        });

        it('refuses to drain the output reserve', () => {
            seed();
            expect(codeOf(() => engine.swapTokensForExactTokens({
                sender: 'alice', amountOut: 4000n, amountInMax: UNLIMITED,
                path: ['A', 'B'], to: 'bob', deadline: DEADLINE,
            }))).toBe('InsufficientLiquidity');
        });
    });

    describe('atomicity', () => {
        it('drops a new pair whose deposit the ledger refuses', () => {
            ledger.mint('A', 'carol', 1000n);
            ledger.approve('A', 'carol', 'pool', 1000n);

            expect(codeOf(() => engine.addLiquidity({
                sender: 'carol', assetA: 'A', assetB: 'B',
                amountADesired: 1000n, amountBDesired: 4000n, amountAMin: 0n, amountBMin: 0n,
                to: 'carol', deadline: DEADLINE,
            }))).toBe('InsufficientAllowance');

            expect(engine.registry.size).toBe(0);
            expect(ledger.balanceOf('A', 'carol')).toBe(1000n);
            expect(ledger.allowance('A', 'carol', 'pool')).toBe(1000n);
        });

        it('reverses completed pulls when a later pull fails', () => {
            ledger.failTransferFrom = 'B';
            expect(() => seed()).toThrow('ledger offline for B');

            expect(engine.registry.size).toBe(0);
            expect(ledger.balanceOf('A', 'alice')).toBe(10_000n);
            expect(ledger.balanceOf('A', 'pool')).toBe(0n);
        });

        it('restores reserves when the swap payout fails', () => {
            seed();
            ledger.failTransfer = 'B';

            expect(() => swapAForB(100n)).toThrow('ledger offline for B');

            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1000n, reserveB: 4000n });
            expect(ledger.balanceOf('A', 'alice')).toBe(9000n);
            expect(ledger.balanceOf('A', 'pool')).toBe(1000n);
        });

        it('rejects a ledger calling back into the same pair with Locked', () => {
            seed();
            let inner: string | undefined;
            ledger.onPull = () => {
                ledger.onPull = undefined;
                inner = codeOf(() => swapAForB(10n));
            };

            expect(swapAForB(100n)).toEqual([100n, 362n]);
            expect(inner).toBe('Locked');
            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1100n, reserveB: 3638n });
        });

        it('does not share locks with another engine', () => {
            seed();
            const otherLedger = new InMemoryTokenLedger();
            fund(otherLedger, 'dave', 100n, 400n);
            const other = new AmmEngine({ ledger: otherLedger, clock: () => NOW });

            let nested: bigint | undefined;
            ledger.onPull = () => {
                ledger.onPull = undefined;
                nested = other.addLiquidity({
                    sender: 'dave', assetA: 'A', assetB: 'B',
                    amountADesired: 100n, amountBDesired: 400n, amountAMin: 0n, amountBMin: 0n,
                    to: 'dave', deadline: DEADLINE,
                }).shares;
            };

            expect(swapAForB(100n)).toEqual([100n, 362n]);
            expect(nested).toBe(200n);
        });
    });

    describe('events', () => {
        it('emits LiquidityAdded and TokensSwapped after commit', () => {
            const added: LiquidityAddedEvent[] = [];
            const swapped: TokensSwappedEvent[] = [];
            engine.on('LiquidityAdded', event => added.push(event));
            engine.on('TokensSwapped', event => swapped.push(event));

            const { pairKey } = seed();
            swapAForB(100n);

            expect(added).toEqual([{
                pairKey, provider: 'alice', to: 'alice', assetA: 'A', assetB: 'B',
                amountA: 1000n, amountB: 4000n, shares: 2000n,
            }]);
            expect(swapped).toEqual([{
                pairKey, sender: 'alice', to: 'bob', assetIn: 'A', assetOut: 'B',
                amountIn: 100n, amountOut: 362n,
            }]);
        });

        it('returns the result and runs later listeners when one throws', () => {
            const swapped: TokensSwappedEvent[] = [];
            engine.on('TokensSwapped', () => { throw new Error('listener failed'); });
            engine.on('TokensSwapped', event => swapped.push(event));
            seed();

            expect(swapAForB(100n)).toEqual([100n, 362n]);
            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1100n, reserveB: 3638n });
            expect(ledger.balanceOf('B', 'bob')).toBe(362n);
            expect(swapped.map(event => event.amountOut)).toEqual([362n]);
        });

        it('emits nothing for a failed operation', () => {
            const removed: unknown[] = [];
            engine.on('LiquidityRemoved', event => removed.push(event));
            seed();

            codeOf(() => engine.removeLiquidity({
                sender: 'alice', assetA: 'A', assetB: 'B', shares: 5000n,
                amountAMin: 0n, amountBMin: 0n, to: 'alice', deadline: DEADLINE,
            }));
            expect(removed).toEqual([]);
        });
    });

    describe('queries', () => {
        it('returns copies of pair state', () => {
            seed();
            const copy = engine.getPair('B', 'A');
            if (!copy) throw new Error('pair missing');
            copy.reserveLow = 0n;
            copy.sharesByOwner.clear();

            expect(engine.getReserves('A', 'B')).toEqual({ reserveA: 1000n, reserveB: 4000n });
            expect(engine.getShareBalance('A', 'B', 'alice')).toBe(2000n);
            expect(engine.listPairs()).toHaveLength(1);
        });

        it('reports zero shares for an unknown pair and PairNotFound for its price', () => {
            expect(engine.getShareBalance('A', 'B', 'alice')).toBe(0n);
            expect(codeOf(() => engine.getPrice('A', 'B'))).toBe('PairNotFound');
            expect(engine.registry.size).toBe(0);
        });

        it('exposes the pricing formulas', () => {
            expect(engine.getAmountOut(0n, 1000n, 4000n)).toBe(0n);
            expect(engine.getAmountOut(100n, 1000n, 4000n)).toBe(362n);
            expect(engine.getAmountIn(362n, 1000n, 4000n)).toBe(100n);
            expect(engine.quote(100n, 1000n, 4000n)).toBe(400n);
        });
    });
});
