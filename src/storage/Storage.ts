import fs from 'fs';
import path from 'path';
import { config } from '../config.js';
import type { PairData, RegistryData } from '../pool/index.js';
import type { LedgerData } from '../ledger/index.js';
import { logger } from '../utils/logger.js';

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Non-negative integers are stored as decimal strings
function isAmount(value: unknown): value is string {
    return typeof value === 'string' && /^\d+$/.test(value);
}

function isAmountRecord(value: unknown): value is Record<string, string> {
    return isObject(value) && Object.values(value).every(isAmount);
}

function isPairData(value: unknown): value is PairData {
    return isObject(value)
        && typeof value.key === 'string'
        && typeof value.assetLow === 'string'
        && typeof value.assetHigh === 'string'
        && isAmount(value.reserveLow)
        && isAmount(value.reserveHigh)
        && isAmount(value.totalShares)
        && isAmountRecord(value.sharesByOwner)
        && Number.isFinite(value.createdAt)
        && Number.isFinite(value.updatedAt);
}

function isRegistryData(value: unknown): value is RegistryData {
    return isObject(value) && Array.isArray(value.pairs) && value.pairs.every(isPairData);
}

function isLedgerData(value: unknown): value is LedgerData {
    return isObject(value)
        && isObject(value.balances)
        && Object.values(value.balances).every(isAmountRecord)
        && isObject(value.allowances)
        && Object.values(value.allowances).every(owners =>
            isObject(owners) && Object.values(owners).every(isAmountRecord)
        );
}

export class Storage {
    private dataDir: string;
    private pairsPath: string;
    private ledgerPath: string;

    constructor(dataDir: string = config.storage.dataDir) {
        this.dataDir = dataDir;
        this.pairsPath = path.join(this.dataDir, config.storage.pairsFile);
        this.ledgerPath = path.join(this.dataDir, config.storage.ledgerFile);
        this.ensureDirectories();
    }

    private ensureDirectories(): void {
        if (!fs.existsSync(this.dataDir)) {
            fs.mkdirSync(this.dataDir, { recursive: true });
        }
    }

    // Pair registry storage
    savePairs(data: RegistryData): void {
        fs.writeFileSync(this.pairsPath, JSON.stringify(data, null, 2));
        logger.debug('💾 Pairs saved to disk');
    }

    loadPairs(): RegistryData | null {
        const data = this.readJson(this.pairsPath, 'pairs');
        if (data === null) return null;
        if (!isRegistryData(data)) {
            logger.error('Failed to load pairs: unexpected file shape');
            return null;
        }
        return data;
    }

    // Ledger storage
    saveLedger(data: LedgerData): void {
        fs.writeFileSync(this.ledgerPath, JSON.stringify(data, null, 2));
        logger.debug('💾 Ledger saved to disk');
    }

    loadLedger(): LedgerData | null {
        const data = this.readJson(this.ledgerPath, 'ledger');
        if (data === null) return null;
        if (!isLedgerData(data)) {
            logger.error('Failed to load ledger: unexpected file shape');
            return null;
        }
        return data;
    }

    private readJson(filePath: string, label: string): unknown {
        if (!fs.existsSync(filePath)) {
            return null;
        }
        try {
            const content = fs.readFileSync(filePath, 'utf-8');
            const parsed: unknown = JSON.parse(content);
            return parsed;
        } catch (error) {
            logger.error(`Failed to load ${label}:`, error);
            return null;
        }
    }
}
