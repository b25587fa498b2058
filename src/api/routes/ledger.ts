/**
 * Ledger API Routes
 * Balances, allowances and testnet minting for the in-memory token ledger
 */

import { Router, Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { InMemoryTokenLedger } from '../../ledger/index.js';
import { inputValidator } from '../../security/input-validator.js';
import { config } from '../../config.js';
import { badRequest, sendError } from '../http.js';

export interface LedgerRouteDeps {
    ledger: InMemoryTokenLedger;
    onChange: () => void;
}

export function createLedgerRoutes({ ledger, onChange }: LedgerRouteDeps): Router {
    const router = Router();

    const mintLimiter = rateLimit({
        windowMs: 60 * 1000, // 1 minute
        max: 10, // 10 mints per minute
        message: {
            success: false,
            error: 'Minting rate limit exceeded. Please wait.',
        },
    });

    /**
     * GET /api/ledger/balance/:owner?asset=
     */
    router.get('/balance/:owner', (req: Request, res: Response) => {
        const owner = inputValidator.validateIdentity(req.params.owner, 'owner');
        const asset = inputValidator.validateIdentity(req.query.asset, 'asset');
        if (!owner.valid) return badRequest(res, owner.error);
        if (!asset.valid) return badRequest(res, asset.error);

        res.json({
            success: true,
            data: {
                owner: owner.value,
                asset: asset.value,
                balance: ledger.balanceOf(asset.value, owner.value).toString(),
            },
        });
    });

    /**
     * GET /api/ledger/allowance?asset=&owner=&spender=
     */
    router.get('/allowance', (req: Request, res: Response) => {
        const asset = inputValidator.validateIdentity(req.query.asset, 'asset');
        const owner = inputValidator.validateIdentity(req.query.owner, 'owner');
        const spender = inputValidator.validateIdentity(req.query.spender ?? config.pool.account, 'spender');
        if (!asset.valid) return badRequest(res, asset.error);
        if (!owner.valid) return badRequest(res, owner.error);
        if (!spender.valid) return badRequest(res, spender.error);

        res.json({
            success: true,
            data: {
                asset: asset.value,
                owner: owner.value,
                spender: spender.value,
                allowance: ledger.allowance(asset.value, owner.value, spender.value).toString(),
            },
        });
    });

    /**
     * POST /api/ledger/mint (testnet only)
     * Body: { asset, to, amount }
     */
    router.post('/mint', mintLimiter, (req: Request, res: Response) => {
        if (!config.faucet.enabled) {
            res.status(403).json({
                success: false,
                error: 'Minting is only available on testnet',
            });
            return;
        }

        const body: Record<string, unknown> = req.body ?? {};
        const asset = inputValidator.validateIdentity(body.asset, 'asset');
        const to = inputValidator.validateIdentity(body.to, 'to');
        const amount = inputValidator.parseAmount(body.amount, 'amount');
        if (!asset.valid) return badRequest(res, asset.error);
        if (!to.valid) return badRequest(res, to.error);
        if (!amount.valid) return badRequest(res, amount.error);

        try {
            ledger.mint(asset.value, to.value, amount.value);
            onChange();
            res.json({
                success: true,
                data: {
                    asset: asset.value,
                    to: to.value,
                    balance: ledger.balanceOf(asset.value, to.value).toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Mint failed');
        }
    });

    /**
     * POST /api/ledger/approve
     * Body: { asset, owner, spender?, amount } (spender defaults to the pool account)
     */
    router.post('/approve', (req: Request, res: Response) => {
        const body: Record<string, unknown> = req.body ?? {};
        const asset = inputValidator.validateIdentity(body.asset, 'asset');
        const owner = inputValidator.validateIdentity(body.owner, 'owner');
        const spender = inputValidator.validateIdentity(body.spender ?? config.pool.account, 'spender');
        const amount = inputValidator.parseAmount(body.amount, 'amount');
        if (!asset.valid) return badRequest(res, asset.error);
        if (!owner.valid) return badRequest(res, owner.error);
        if (!spender.valid) return badRequest(res, spender.error);
        if (!amount.valid) return badRequest(res, amount.error);

        try {
            ledger.approve(asset.value, owner.value, spender.value, amount.value);
            onChange();
            res.json({
                success: true,
                data: {
                    asset: asset.value,
                    owner: owner.value,
                    spender: spender.value,
                    allowance: amount.value.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Approve failed');
        }
    });

    /**
     * POST /api/ledger/transfer
     * Body: { asset, from, to, amount }
     */
    router.post('/transfer', (req: Request, res: Response) => {
        const body: Record<string, unknown> = req.body ?? {};
        const asset = inputValidator.validateIdentity(body.asset, 'asset');
        const from = inputValidator.validateIdentity(body.from, 'from');
        const to = inputValidator.validateIdentity(body.to, 'to');
        const amount = inputValidator.parseAmount(body.amount, 'amount');
        if (!asset.valid) return badRequest(res, asset.error);
        if (!from.valid) return badRequest(res, from.error);
        if (!to.valid) return badRequest(res, to.error);
        if (!amount.valid) return badRequest(res, amount.error);

        try {
            ledger.transfer(asset.value, from.value, to.value, amount.value);
            onChange();
            res.json({
                success: true,
                data: {
                    asset: asset.value,
                    from: from.value,
                    to: to.value,
                    amount: amount.value.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Transfer failed');
        }
    });

    return router;
}
