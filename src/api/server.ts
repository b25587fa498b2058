import express, { Express, Request, Response, NextFunction, Router } from 'express';
import type { Server } from 'http';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from './swagger.js';
import { config } from '../config.js';
import { AmmEngine } from '../pool/index.js';
import { InMemoryTokenLedger } from '../ledger/index.js';
import { loadContext } from '../context.js';
import { logger } from '../utils/logger.js';
import { createPoolRoutes } from './routes/pool.js';
import { createLedgerRoutes } from './routes/ledger.js';

export interface AppDeps {
    engine: AmmEngine;
    ledger: InMemoryTokenLedger;
    // Called after every successful mutation
    onChange?: () => void;
    // Unix seconds; used for default deadlines
    clock?: () => number;
}

export function createApp({ engine, ledger, onChange = () => {}, clock = () => Math.floor(Date.now() / 1000) }: AppDeps): Express {
    const app: Express = express();

    const apiLimiter = rateLimit({
        windowMs: config.api.rateLimit.windowMs,
        max: config.api.rateLimit.maxRequests,
        standardHeaders: true,
        legacyHeaders: false,
        message: {
            success: false,
            error: 'Too many requests, please try again later.',
        },
    });

    // Trust proxy for a reverse proxy in front (needed for rate limiting)
    app.set('trust proxy', 1);
    app.use(cors(config.api.cors));
    app.use(express.json({ limit: '100kb' }));
    app.use(apiLimiter);

    // Request logging
    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.debug(`${req.method} ${req.path}`);
        if (req.method === 'POST' || req.method === 'PUT') {
            logger.debug(`Body: ${JSON.stringify(req.body)}`);
        }
        next();
    });

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            success: true,
            data: {
                status: 'healthy',
                version: '1.0.0',
                uptime: process.uptime(),
                timestamp: Date.now(),
            },
        });
    });

    // API Info
    app.get('/api', (_req: Request, res: Response) => {
        res.json({
            success: true,
            data: {
                name: 'PairSwap API',
                version: '1.0.0',
                network: config.network_mode,
                poolAccount: engine.poolAccount,
                pairs: engine.registry.size,
                mintEnabled: config.faucet.enabled,
                documentation: '/api/docs',
            },
        });
    });

    // Swagger Documentation
    app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
        customCss: '.swagger-ui .topbar { display: none }',
        customSiteTitle: 'PairSwap API Docs',
    }));

    app.get('/api/docs.json', (_req: Request, res: Response) => {
        res.json(swaggerSpec);
    });

    const v1Router = Router();
    v1Router.use('/pool', createPoolRoutes({ engine, clock, onChange }));
    v1Router.use('/ledger', createLedgerRoutes({ ledger, onChange }));
    app.use('/api/v1', v1Router);

    // 404 handler
    app.use((_req: Request, res: Response) => {
        res.status(404).json({
            success: false,
            error: 'Endpoint not found',
        });
    });

    // Error handler
    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof SyntaxError) {
            res.status(400).json({ success: false, error: 'Malformed JSON body' });
            return;
        }
        logger.error('Server error:', err);
        res.status(500).json({
            success: false,
            error: 'Internal server error',
        });
    });

    return app;
}

/**
 * Load state from the data directory and serve it over HTTP.
 * Every successful mutation is written back to disk.
 */
export function startServer(port: number = config.network.apiPort, dataDir: string = config.storage.dataDir): Server {
    const context = loadContext(dataDir);
    const app = createApp({
        engine: context.engine,
        ledger: context.ledger,
        onChange: () => context.save(),
    });

    context.engine.on('LiquidityAdded', event => {
        logger.info(`➕ Liquidity added to ${event.pairKey.slice(0, 12)}: ${event.amountA} / ${event.amountB}`);
    });
    context.engine.on('LiquidityRemoved', event => {
        logger.info(`➖ Liquidity removed from ${event.pairKey.slice(0, 12)}: ${event.amountA} / ${event.amountB}`);
    });
    context.engine.on('TokensSwapped', event => {
        logger.info(`🔄 Swap ${event.amountIn} ${event.assetIn} → ${event.amountOut} ${event.assetOut}`);
    });

    const server = app.listen(port, () => {
        logger.info(`🚀 API Server running on http://localhost:${port}`);
        logger.info(`📊 API v1 available at /api/v1`);
        logger.info(`📂 Data directory: ${dataDir} (${context.registry.size} pairs)`);
    });

    // Graceful shutdown
    process.on('SIGINT', () => {
        logger.info('Shutting down...');
        context.save();
        server.close();
        process.exit(0);
    });

    return server;
}
