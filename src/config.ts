const isTestnet = process.env.NETWORK_MODE !== 'mainnet';

type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevelSetting[] = ['debug', 'info', 'warn', 'error', 'silent'];

function readLogLevel(value: string | undefined): LogLevelSetting {
    const found = LOG_LEVELS.find(level => level === value);
    return found ?? 'info';
}

function readInt(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
    network_mode: isTestnet ? 'testnet' : 'mainnet',
    isTestnet,
    pool: {
        // Ledger identity that holds pool custody for every pair
        account: process.env.POOL_ACCOUNT || 'pool',
        // CLI/API default: deadline = now + deadlineSeconds when the caller gives none
        deadlineSeconds: readInt(process.env.DEADLINE_SECONDS, 20 * 60),
    },
    network: {
        apiPort: readInt(process.env.API_PORT, 3001),
    },
    storage: {
        dataDir: process.env.DATA_DIR || (isTestnet ? './data/testnet' : './data/mainnet'),
        pairsFile: 'pairs.json',
        ledgerFile: 'ledger.json',
    },
    api: {
        rateLimit: {
            windowMs: 60000,
            maxRequests: 100,
        },
        cors: {
            origin: '*',
        },
    },
    // Test-token minting through the ledger; never on mainnet
    faucet: {
        enabled: isTestnet,
    },
    logging: {
        level: readLogLevel(process.env.LOG_LEVEL),
    },
};
export type Config = typeof config;
export type { LogLevelSetting };
