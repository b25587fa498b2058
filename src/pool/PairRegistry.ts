/**
 * Pair Registry
 *
 * Maps an unordered asset pair to exactly one Pair record. The key is the
 * SHA-256 of the sorted identifiers encoded as a JSON array, so (a, b) and
 * (b, a) land on the same pool and no two distinct pairs share an input.
 */

import { createHash } from 'crypto';
import { AmmError } from './errors.js';
import { createPair, pairFromData, pairToData } from './Pair.js';
import type { Pair, PairData, PairKey } from './Pair.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Registry');

export interface RegistryData {
    pairs: PairData[];
}

export function sortAssets(assetX: string, assetY: string): [string, string] {
    if (assetX === assetY) {
        throw new AmmError('IdenticalAssets');
    }
    return assetX < assetY ? [assetX, assetY] : [assetY, assetX];
}

export function canonicalKey(assetX: string, assetY: string): PairKey {
    const [low, high] = sortAssets(assetX, assetY);
    return createHash('sha256')
        .update(JSON.stringify([low, high]))
        .digest('hex');
}

export class PairRegistry {
    private pairs: Map<PairKey, Pair> = new Map();

    get size(): number {
        return this.pairs.size;
    }

    find(assetX: string, assetY: string): Pair | undefined {
        return this.pairs.get(canonicalKey(assetX, assetY));
    }

    getOrCreate(assetX: string, assetY: string, now: number = 0): { pair: Pair; created: boolean } {
        const key = canonicalKey(assetX, assetY);
        const existing = this.pairs.get(key);
        if (existing) {
            return { pair: existing, created: false };
        }

        const [low, high] = sortAssets(assetX, assetY);
        const pair = createPair(key, low, high, now);
        this.pairs.set(key, pair);
        log.debug(`Pair created: ${low}/${high} (${key.slice(0, 12)}...)`);
        return { pair, created: true };
    }

    /**
     * Pools are never created implicitly by removals, swaps or price queries
     */
    getExisting(assetX: string, assetY: string): Pair {
        const pair = this.find(assetX, assetY);
        if (!pair) {
            throw new AmmError('PairNotFound', `No pair for ${assetX}/${assetY}`);
        }
        return pair;
    }

    /**
     * Undo the creation of a pair whose first deposit failed.
     * Pairs that ever held liquidity are never evicted.
     */
    evict(key: PairKey): void {
        const pair = this.pairs.get(key);
        if (pair && pair.totalShares === 0n) {
            this.pairs.delete(key);
        }
    }

    list(): Pair[] {
        return Array.from(this.pairs.values());
    }

    toJSON(): RegistryData {
        return { pairs: this.list().map(pairToData) };
    }

    loadFromData(data: RegistryData): void {
        this.pairs.clear();
        for (const entry of data.pairs) {
            const pair = pairFromData(entry);
            const key = canonicalKey(pair.assetLow, pair.assetHigh);
            if (key !== pair.key) {
                throw new Error(`Stored key mismatch for ${pair.assetLow}/${pair.assetHigh}`);
            }
            this.pairs.set(key, pair);
        }
        log.info(`📂 Loaded ${this.pairs.size} pairs`);
    }
}
