import swaggerJsdoc from 'swagger-jsdoc';
import { config } from '../config.js';

const amount = { type: 'string', pattern: '^\\d+$', description: 'Integer amount in base units' };
const identity = { type: 'string', maxLength: 128 };

const errorResponse = {
    description: 'Rejected operation',
    content: {
        'application/json': { schema: { $ref: '#/components/schemas/Error' } },
    },
};

const options: swaggerJsdoc.Options = {
    definition: {
        openapi: '3.0.0',
        info: {
            title: 'PairSwap API',
            version: '1.0.0',
            description: 'Constant-product liquidity pools over a token ledger',
        },
        servers: [
            {
                url: `http://localhost:${config.network.apiPort}/api/v1`,
                description: 'Development server',
            },
        ],
        tags: [
            { name: 'Pool', description: 'Liquidity and swaps' },
            { name: 'Ledger', description: 'Balances and allowances' },
        ],
        components: {
            schemas: {
                Error: {
                    type: 'object',
                    properties: {
                        success: { type: 'boolean', example: false },
                        error: { type: 'string' },
                        code: { type: 'string', example: 'InsufficientOutputAmount' },
                    },
                },
                Pair: {
                    type: 'object',
                    properties: {
                        key: { type: 'string', description: 'SHA-256 of the sorted asset pair' },
                        assetLow: identity,
                        assetHigh: identity,
                        reserveLow: amount,
                        reserveHigh: amount,
                        totalShares: amount,
                        createdAt: { type: 'integer' },
                        updatedAt: { type: 'integer' },
                    },
                },
                AddLiquidity: {
                    type: 'object',
                    required: ['sender', 'assetA', 'assetB', 'amountADesired', 'amountBDesired'],
                    properties: {
                        sender: identity,
                        assetA: identity,
                        assetB: identity,
                        amountADesired: amount,
                        amountBDesired: amount,
                        amountAMin: amount,
                        amountBMin: amount,
                        to: identity,
                        deadline: { type: 'integer', description: 'Unix seconds' },
                    },
                },
                RemoveLiquidity: {
                    type: 'object',
                    required: ['sender', 'assetA', 'assetB', 'shares'],
                    properties: {
                        sender: identity,
                        assetA: identity,
                        assetB: identity,
                        shares: amount,
                        amountAMin: amount,
                        amountBMin: amount,
                        to: identity,
                        deadline: { type: 'integer' },
                    },
                },
                SwapExactIn: {
                    type: 'object',
                    required: ['sender', 'amountIn', 'path'],
                    properties: {
                        sender: identity,
                        amountIn: amount,
                        amountOutMin: amount,
                        path: { type: 'array', items: identity, minItems: 2, maxItems: 2 },
                        to: identity,
                        deadline: { type: 'integer' },
                    },
                },
                SwapExactOut: {
                    type: 'object',
                    required: ['sender', 'amountOut', 'amountInMax', 'path'],
                    properties: {
                        sender: identity,
                        amountOut: amount,
                        amountInMax: amount,
                        path: { type: 'array', items: identity, minItems: 2, maxItems: 2 },
                        to: identity,
                        deadline: { type: 'integer' },
                    },
                },
            },
        },
        paths: {
            '/pool/pairs': {
                get: {
                    tags: ['Pool'],
                    summary: 'List pairs',
                    responses: { 200: { description: 'All known pairs' } },
                },
            },
            '/pool/pair': {
                get: {
                    tags: ['Pool'],
                    summary: 'Reserves of a pair, in argument order',
                    parameters: [
                        { name: 'assetA', in: 'query', required: true, schema: identity },
                        { name: 'assetB', in: 'query', required: true, schema: identity },
                    ],
                    responses: { 200: { description: 'Pair reserves' }, 404: errorResponse },
                },
            },
            '/pool/price': {
                get: {
                    tags: ['Pool'],
                    summary: 'Price of base in quote, scaled by 1e18',
                    parameters: [
                        { name: 'base', in: 'query', required: true, schema: identity },
                        { name: 'quote', in: 'query', required: true, schema: identity },
                    ],
                    responses: { 200: { description: 'Scaled price' }, 400: errorResponse },
                },
            },
            '/pool/amount-out': {
                get: {
                    tags: ['Pool'],
                    summary: 'Output for an exact input, after the 0.3% fee',
                    parameters: [
                        { name: 'amountIn', in: 'query', required: true, schema: amount },
                        { name: 'reserveIn', in: 'query', required: true, schema: amount },
                        { name: 'reserveOut', in: 'query', required: true, schema: amount },
                    ],
                    responses: { 200: { description: 'Amount out' }, 400: errorResponse },
                },
            },
            '/pool/amount-in': {
                get: {
                    tags: ['Pool'],
                    summary: 'Input required for an exact output',
                    parameters: [
                        { name: 'amountOut', in: 'query', required: true, schema: amount },
                        { name: 'reserveIn', in: 'query', required: true, schema: amount },
                        { name: 'reserveOut', in: 'query', required: true, schema: amount },
                    ],
                    responses: { 200: { description: 'Amount in' }, 400: errorResponse },
                },
            },
            '/pool/quote': {
                get: {
                    tags: ['Pool'],
                    summary: 'Quote a swap against current reserves',
                    parameters: [
                        { name: 'assetIn', in: 'query', required: true, schema: identity },
                        { name: 'assetOut', in: 'query', required: true, schema: identity },
                        { name: 'amountIn', in: 'query', required: true, schema: amount },
                    ],
                    responses: { 200: { description: 'Quote' }, 404: errorResponse },
                },
            },
            '/pool/shares/{owner}': {
                get: {
                    tags: ['Pool'],
                    summary: 'Liquidity shares held by an owner',
                    parameters: [
                        { name: 'owner', in: 'path', required: true, schema: identity },
                        { name: 'assetA', in: 'query', required: true, schema: identity },
                        { name: 'assetB', in: 'query', required: true, schema: identity },
                    ],
                    responses: { 200: { description: 'Share balance' } },
                },
            },
            '/pool/liquidity/add': {
                post: {
                    tags: ['Pool'],
                    summary: 'Deposit both assets and mint shares',
                    requestBody: {
                        required: true,
                        content: { 'application/json': { schema: { $ref: '#/components/schemas/AddLiquidity' } } },
                    },
                    responses: { 200: { description: 'Deposited amounts and minted shares' }, 400: errorResponse },
                },
            },
            '/pool/liquidity/remove': {
                post: {
                    tags: ['Pool'],
                    summary: 'Burn shares and withdraw both assets',
                    requestBody: {
                        required: true,
                        content: { 'application/json': { schema: { $ref: '#/components/schemas/RemoveLiquidity' } } },
                    },
                    responses: { 200: { description: 'Withdrawn amounts' }, 400: errorResponse, 404: errorResponse },
                },
            },
            '/pool/swap/exact-in': {
                post: {
                    tags: ['Pool'],
                    summary: 'Swap an exact input amount',
                    requestBody: {
                        required: true,
                        content: { 'application/json': { schema: { $ref: '#/components/schemas/SwapExactIn' } } },
                    },
                    responses: { 200: { description: 'Amounts paid and received' }, 400: errorResponse, 404: errorResponse },
                },
            },
            '/pool/swap/exact-out': {
                post: {
                    tags: ['Pool'],
                    summary: 'Swap for an exact output amount',
                    requestBody: {
                        required: true,
                        content: { 'application/json': { schema: { $ref: '#/components/schemas/SwapExactOut' } } },
                    },
                    responses: { 200: { description: 'Amounts paid and received' }, 400: errorResponse, 404: errorResponse },
                },
            },
            '/ledger/balance/{owner}': {
                get: {
                    tags: ['Ledger'],
                    summary: 'Balance of an owner in one asset',
                    parameters: [
                        { name: 'owner', in: 'path', required: true, schema: identity },
                        { name: 'asset', in: 'query', required: true, schema: identity },
                    ],
                    responses: { 200: { description: 'Balance' } },
                },
            },
            '/ledger/allowance': {
                get: {
                    tags: ['Ledger'],
                    summary: 'Allowance granted by an owner to a spender',
                    parameters: [
                        { name: 'asset', in: 'query', required: true, schema: identity },
                        { name: 'owner', in: 'query', required: true, schema: identity },
                        { name: 'spender', in: 'query', required: false, schema: identity },
                    ],
                    responses: { 200: { description: 'Allowance' } },
                },
            },
            '/ledger/mint': {
                post: {
                    tags: ['Ledger'],
                    summary: 'Mint test tokens (testnet only)',
                    responses: { 200: { description: 'New balance' }, 403: errorResponse },
                },
            },
            '/ledger/approve': {
                post: {
                    tags: ['Ledger'],
                    summary: 'Set an allowance (spender defaults to the pool account)',
                    responses: { 200: { description: 'Allowance set' }, 400: errorResponse },
                },
            },
            '/ledger/transfer': {
                post: {
                    tags: ['Ledger'],
                    summary: 'Move tokens between identities',
                    responses: { 200: { description: 'Transfer done' }, 400: errorResponse },
                },
            },
        },
    },
    apis: [],
};

export const swaggerSpec = swaggerJsdoc(options);
