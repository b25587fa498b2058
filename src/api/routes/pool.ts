/**
 * Pool API Routes
 *
 * Amounts travel as decimal strings (base units); numbers are accepted on
 * input while they stay within Number.MAX_SAFE_INTEGER.
 */

import { Router, Request, Response } from 'express';
import { AmmEngine, PRICE_SCALE, pairToData } from '../../pool/index.js';
import { inputValidator } from '../../security/input-validator.js';
import { config } from '../../config.js';
import { badRequest, sendError } from '../http.js';

export interface PoolRouteDeps {
    engine: AmmEngine;
    clock: () => number;
    onChange: () => void;
}

export function createPoolRoutes({ engine, clock, onChange }: PoolRouteDeps): Router {
    const router = Router();

    /**
     * GET /api/pool/pairs
     * All pairs that ever received liquidity
     */
    router.get('/pairs', (_req: Request, res: Response) => {
        res.json({
            success: true,
            data: engine.listPairs().map(pairToData),
        });
    });

    /**
     * GET /api/pool/pair?assetA=&assetB=
     */
    router.get('/pair', (req: Request, res: Response) => {
        const assetA = inputValidator.validateIdentity(req.query.assetA, 'assetA');
        const assetB = inputValidator.validateIdentity(req.query.assetB, 'assetB');
        if (!assetA.valid) return badRequest(res, assetA.error);
        if (!assetB.valid) return badRequest(res, assetB.error);

        try {
            const { reserveA, reserveB } = engine.getReserves(assetA.value, assetB.value);
            const pair = engine.getPair(assetA.value, assetB.value);
            res.json({
                success: true,
                data: {
                    key: pair?.key,
                    assetA: assetA.value,
                    assetB: assetB.value,
                    reserveA: reserveA.toString(),
                    reserveB: reserveB.toString(),
                    totalShares: pair?.totalShares.toString(),
                    providers: pair?.sharesByOwner.size,
                },
            });
        } catch (error) {
            sendError(res, error, 'Pair lookup failed');
        }
    });

    /**
     * GET /api/pool/price?base=&quote=
     * Price of one unit of `base` in `quote`, scaled by 1e18
     */
    router.get('/price', (req: Request, res: Response) => {
        const base = inputValidator.validateIdentity(req.query.base, 'base');
        const quoteAsset = inputValidator.validateIdentity(req.query.quote, 'quote');
        if (!base.valid) return badRequest(res, base.error);
        if (!quoteAsset.valid) return badRequest(res, quoteAsset.error);

        try {
            const price = engine.getPrice(base.value, quoteAsset.value);
            res.json({
                success: true,
                data: {
                    base: base.value,
                    quote: quoteAsset.value,
                    price: price.toString(),
                    scale: PRICE_SCALE.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Price failed');
        }
    });

    /**
     * GET /api/pool/amount-out?amountIn=&reserveIn=&reserveOut=
     * Pure pricing formula, no pool lookup
     */
    router.get('/amount-out', (req: Request, res: Response) => {
        const amountIn = inputValidator.parseAmount(req.query.amountIn, 'amountIn');
        const reserveIn = inputValidator.parseAmount(req.query.reserveIn, 'reserveIn');
        const reserveOut = inputValidator.parseAmount(req.query.reserveOut, 'reserveOut');
        if (!amountIn.valid) return badRequest(res, amountIn.error);
        if (!reserveIn.valid) return badRequest(res, reserveIn.error);
        if (!reserveOut.valid) return badRequest(res, reserveOut.error);

        try {
            const amountOut = engine.getAmountOut(amountIn.value, reserveIn.value, reserveOut.value);
            res.json({ success: true, data: { amountOut: amountOut.toString() } });
        } catch (error) {
            sendError(res, error, 'Amount out failed');
        }
    });

    /**
     * GET /api/pool/amount-in?amountOut=&reserveIn=&reserveOut=
     */
    router.get('/amount-in', (req: Request, res: Response) => {
        const amountOut = inputValidator.parseAmount(req.query.amountOut, 'amountOut');
        const reserveIn = inputValidator.parseAmount(req.query.reserveIn, 'reserveIn');
        const reserveOut = inputValidator.parseAmount(req.query.reserveOut, 'reserveOut');
        if (!amountOut.valid) return badRequest(res, amountOut.error);
        if (!reserveIn.valid) return badRequest(res, reserveIn.error);
        if (!reserveOut.valid) return badRequest(res, reserveOut.error);

        try {
            const amountIn = engine.getAmountIn(amountOut.value, reserveIn.value, reserveOut.value);
            res.json({ success: true, data: { amountIn: amountIn.toString() } });
        } catch (error) {
            sendError(res, error, 'Amount in failed');
        }
    });

    /**
     * GET /api/pool/quote?assetIn=&assetOut=&amountIn=
     * Swap quote against current reserves, without executing
     */
    router.get('/quote', (req: Request, res: Response) => {
        const assetIn = inputValidator.validateIdentity(req.query.assetIn, 'assetIn');
        const assetOut = inputValidator.validateIdentity(req.query.assetOut, 'assetOut');
        const amountIn = inputValidator.parseAmount(req.query.amountIn, 'amountIn');
        if (!assetIn.valid) return badRequest(res, assetIn.error);
        if (!assetOut.valid) return badRequest(res, assetOut.error);
        if (!amountIn.valid) return badRequest(res, amountIn.error);

        try {
            const { reserveA, reserveB } = engine.getReserves(assetIn.value, assetOut.value);
            const amountOut = engine.getAmountOut(amountIn.value, reserveA, reserveB);
            res.json({
                success: true,
                data: {
                    assetIn: assetIn.value,
                    assetOut: assetOut.value,
                    amountIn: amountIn.value.toString(),
                    amountOut: amountOut.toString(),
                    reserveIn: reserveA.toString(),
                    reserveOut: reserveB.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Quote failed');
        }
    });

    /**
     * GET /api/pool/shares/:owner?assetA=&assetB=
     */
    router.get('/shares/:owner', (req: Request, res: Response) => {
        const owner = inputValidator.validateIdentity(req.params.owner, 'owner');
        const assetA = inputValidator.validateIdentity(req.query.assetA, 'assetA');
        const assetB = inputValidator.validateIdentity(req.query.assetB, 'assetB');
        if (!owner.valid) return badRequest(res, owner.error);
        if (!assetA.valid) return badRequest(res, assetA.error);
        if (!assetB.valid) return badRequest(res, assetB.error);

        try {
            const shares = engine.getShareBalance(assetA.value, assetB.value, owner.value);
            const pair = engine.getPair(assetA.value, assetB.value);
            res.json({
                success: true,
                data: {
                    owner: owner.value,
                    shares: shares.toString(),
                    totalShares: (pair?.totalShares ?? 0n).toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Share lookup failed');
        }
    });

    /**
     * POST /api/pool/liquidity/add
     */
    router.post('/liquidity/add', (req: Request, res: Response) => {
        const body: Record<string, unknown> = req.body ?? {};
        const sender = inputValidator.validateIdentity(body.sender, 'sender');
        const assetA = inputValidator.validateIdentity(body.assetA, 'assetA');
        const assetB = inputValidator.validateIdentity(body.assetB, 'assetB');
        const to = inputValidator.validateIdentity(body.to ?? body.sender, 'to');
        const amountADesired = inputValidator.parseAmount(body.amountADesired, 'amountADesired');
        const amountBDesired = inputValidator.parseAmount(body.amountBDesired, 'amountBDesired');
        const amountAMin = inputValidator.parseOptionalAmount(body.amountAMin, 'amountAMin');
        const amountBMin = inputValidator.parseOptionalAmount(body.amountBMin, 'amountBMin');
        const deadline = inputValidator.parseDeadline(body.deadline, clock(), config.pool.deadlineSeconds);

        if (!sender.valid) return badRequest(res, sender.error);
        if (!assetA.valid) return badRequest(res, assetA.error);
        if (!assetB.valid) return badRequest(res, assetB.error);
        if (!to.valid) return badRequest(res, to.error);
        if (!amountADesired.valid) return badRequest(res, amountADesired.error);
        if (!amountBDesired.valid) return badRequest(res, amountBDesired.error);
        if (!amountAMin.valid) return badRequest(res, amountAMin.error);
        if (!amountBMin.valid) return badRequest(res, amountBMin.error);
        if (!deadline.valid) return badRequest(res, deadline.error);

        try {
            const result = engine.addLiquidity({
                sender: sender.value,
                assetA: assetA.value,
                assetB: assetB.value,
                amountADesired: amountADesired.value,
                amountBDesired: amountBDesired.value,
                amountAMin: amountAMin.value,
                amountBMin: amountBMin.value,
                to: to.value,
                deadline: deadline.value,
            });
            onChange();

            res.json({
                success: true,
                data: {
                    pairKey: result.pairKey,
                    amountA: result.amountA.toString(),
                    amountB: result.amountB.toString(),
                    shares: result.shares.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Add liquidity failed');
        }
    });

    /**
     * POST /api/pool/liquidity/remove
     */
    router.post('/liquidity/remove', (req: Request, res: Response) => {
        const body: Record<string, unknown> = req.body ?? {};
        const sender = inputValidator.validateIdentity(body.sender, 'sender');
        const assetA = inputValidator.validateIdentity(body.assetA, 'assetA');
        const assetB = inputValidator.validateIdentity(body.assetB, 'assetB');
        const to = inputValidator.validateIdentity(body.to ?? body.sender, 'to');
        const shares = inputValidator.parseAmount(body.shares, 'shares');
        const amountAMin = inputValidator.parseOptionalAmount(body.amountAMin, 'amountAMin');
        const amountBMin = inputValidator.parseOptionalAmount(body.amountBMin, 'amountBMin');
        const deadline = inputValidator.parseDeadline(body.deadline, clock(), config.pool.deadlineSeconds);

        if (!sender.valid) return badRequest(res, sender.error);
        if (!assetA.valid) return badRequest(res, assetA.error);
        if (!assetB.valid) return badRequest(res, assetB.error);
        if (!to.valid) return badRequest(res, to.error);
        if (!shares.valid) return badRequest(res, shares.error);
        if (!amountAMin.valid) return badRequest(res, amountAMin.error);
        if (!amountBMin.valid) return badRequest(res, amountBMin.error);
        if (!deadline.valid) return badRequest(res, deadline.error);

        try {
            const result = engine.removeLiquidity({
                sender: sender.value,
                assetA: assetA.value,
                assetB: assetB.value,
                shares: shares.value,
                amountAMin: amountAMin.value,
                amountBMin: amountBMin.value,
                to: to.value,
                deadline: deadline.value,
            });
            onChange();

            res.json({
                success: true,
                data: {
                    pairKey: result.pairKey,
                    amountA: result.amountA.toString(),
                    amountB: result.amountB.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Remove liquidity failed');
        }
    });

    /**
     * POST /api/pool/swap/exact-in
     * Body: { sender, amountIn, amountOutMin, path: [assetIn, assetOut], to, deadline }
     */
    router.post('/swap/exact-in', (req: Request, res: Response) => {
        const body: Record<string, unknown> = req.body ?? {};
        const sender = inputValidator.validateIdentity(body.sender, 'sender');
        const to = inputValidator.validateIdentity(body.to ?? body.sender, 'to');
        const path = inputValidator.parsePath(body.path);
        const amountIn = inputValidator.parseAmount(body.amountIn, 'amountIn');
        const amountOutMin = inputValidator.parseOptionalAmount(body.amountOutMin, 'amountOutMin');
        const deadline = inputValidator.parseDeadline(body.deadline, clock(), config.pool.deadlineSeconds);

        if (!sender.valid) return badRequest(res, sender.error);
        if (!to.valid) return badRequest(res, to.error);
        if (!path.valid) return badRequest(res, path.error);
        if (!amountIn.valid) return badRequest(res, amountIn.error);
        if (!amountOutMin.valid) return badRequest(res, amountOutMin.error);
        if (!deadline.valid) return badRequest(res, deadline.error);

        try {
            const [paid, received] = engine.swapExactTokensForTokens({
                sender: sender.value,
                amountIn: amountIn.value,
                amountOutMin: amountOutMin.value,
                path: path.value,
                to: to.value,
                deadline: deadline.value,
            });
            onChange();

            res.json({
                success: true,
                data: { amounts: [paid.toString(), received.toString()] },
            });
        } catch (error) {
            sendError(res, error, 'Swap failed');
        }
    });

    /**
     * POST /api/pool/swap/exact-out
     * Body: { sender, amountOut, amountInMax, path: [assetIn, assetOut], to, deadline }
     */
    router.post('/swap/exact-out', (req: Request, res: Response) => {
        const body: Record<string, unknown> = req.body ?? {};
        const sender = inputValidator.validateIdentity(body.sender, 'sender');
        const to = inputValidator.validateIdentity(body.to ?? body.sender, 'to');
        const path = inputValidator.parsePath(body.path);
        const amountOut = inputValidator.parseAmount(body.amountOut, 'amountOut');
        const amountInMax = inputValidator.parseAmount(body.amountInMax, 'amountInMax');
        const deadline = inputValidator.parseDeadline(body.deadline, clock(), config.pool.deadlineSeconds);

        if (!sender.valid) return badRequest(res, sender.error);
        if (!to.valid) return badRequest(res, to.error);
        if (!path.valid) return badRequest(res, path.error);
        if (!amountOut.valid) return badRequest(res, amountOut.error);
        if (!amountInMax.valid) return badRequest(res, amountInMax.error);
        if (!deadline.valid) return badRequest(res, deadline.error);

        try {
            const [paid, received] = engine.swapTokensForExactTokens({
                sender: sender.value,
                amountOut: amountOut.value,
                amountInMax: amountInMax.value,
                path: path.value,
                to: to.value,
                deadline: deadline.value,
            });
            onChange();

            res.json({
                success: true,
                data: { amounts: [paid.toString(), received.toString()] },
            });
        } catch (error) {
            sendError(res, error, 'Swap failed');
        }
    });

    return router;
}
