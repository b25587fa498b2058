import { Response } from 'express';
import { AmmError } from '../pool/index.js';
import { LedgerError } from '../ledger/index.js';
import { logger } from '../utils/logger.js';

const log = logger.child('API');

export function statusFor(error: unknown): number {
    if (error instanceof AmmError) {
        if (error.code === 'PairNotFound') return 404;
        if (error.code === 'Locked') return 409;
        return 400;
    }
    if (error instanceof LedgerError) return 400;
    return 500;
}

export function sendError(res: Response, error: unknown, fallback: string): void {
    const status = statusFor(error);
    if (status === 500) {
        log.error(`${fallback}:`, error);
        res.status(500).json({ success: false, error: 'Internal server error' });
        return;
    }

    const code = error instanceof AmmError || error instanceof LedgerError ? error.code : undefined;
    res.status(status).json({
        success: false,
        error: error instanceof Error ? error.message : fallback,
        code,
    });
}

export function badRequest(res: Response, error: string): void {
    res.status(400).json({ success: false, error });
}
