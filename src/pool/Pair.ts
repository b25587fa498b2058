/**
 * Pair record: one liquidity pool for an unordered asset pair
 */

export type PairKey = string;

export interface Pair {
    key: PairKey;
    assetLow: string;          // assetLow < assetHigh
    assetHigh: string;
    reserveLow: bigint;
    reserveHigh: bigint;
    totalShares: bigint;
    sharesByOwner: Map<string, bigint>;
    createdAt: number;         // unix seconds
    updatedAt: number;
}

// BigInt as string for JSON
export interface PairData {
    key: PairKey;
    assetLow: string;
    assetHigh: string;
    reserveLow: string;
    reserveHigh: string;
    totalShares: string;
    sharesByOwner: Record<string, string>;
    createdAt: number;
    updatedAt: number;
}

export function createPair(key: PairKey, assetLow: string, assetHigh: string, now: number): Pair {
    return {
        key,
        assetLow,
        assetHigh,
        reserveLow: 0n,
        reserveHigh: 0n,
        totalShares: 0n,
        sharesByOwner: new Map(),
        createdAt: now,
        updatedAt: now,
    };
}

export function clonePair(pair: Pair): Pair {
    return { ...pair, sharesByOwner: new Map(pair.sharesByOwner) };
}

/**
 * Copy every field of `source` onto `target` in place, so references held by
 * the registry stay valid after a rollback.
 */
export function restorePair(target: Pair, source: Pair): void {
    target.reserveLow = source.reserveLow;
    target.reserveHigh = source.reserveHigh;
    target.totalShares = source.totalShares;
    target.sharesByOwner = new Map(source.sharesByOwner);
    target.createdAt = source.createdAt;
    target.updatedAt = source.updatedAt;
}

export function reserveOf(pair: Pair, asset: string): bigint {
    if (asset === pair.assetLow) return pair.reserveLow;
    if (asset === pair.assetHigh) return pair.reserveHigh;
    throw new Error(`Asset ${asset} is not part of pair ${pair.key}`);
}

/**
 * Reserves ordered as (asset, other asset of the pair)
 */
export function reservesFor(pair: Pair, asset: string): [bigint, bigint] {
    return asset === pair.assetLow
        ? [pair.reserveLow, pair.reserveHigh]
        : [pair.reserveHigh, pair.reserveLow];
}

export function adjustReserve(pair: Pair, asset: string, delta: bigint): void {
    if (asset === pair.assetLow) {
        pair.reserveLow += delta;
    } else if (asset === pair.assetHigh) {
        pair.reserveHigh += delta;
    } else {
        throw new Error(`Asset ${asset} is not part of pair ${pair.key}`);
    }
}

export function shareBalance(pair: Pair, owner: string): bigint {
    return pair.sharesByOwner.get(owner) ?? 0n;
}

export function creditShares(pair: Pair, owner: string, shares: bigint): void {
    pair.totalShares += shares;
    pair.sharesByOwner.set(owner, shareBalance(pair, owner) + shares);
}

export function debitShares(pair: Pair, owner: string, shares: bigint): void {
    const balance = shareBalance(pair, owner);
    if (shares > balance) {
        throw new Error(`Share debit ${shares} exceeds balance ${balance}`);
    }
    pair.totalShares -= shares;
    const remaining = balance - shares;
    if (remaining === 0n) {
        pair.sharesByOwner.delete(owner);
    } else {
        pair.sharesByOwner.set(owner, remaining);
    }
}

export function pairToData(pair: Pair): PairData {
    return {
        key: pair.key,
        assetLow: pair.assetLow,
        assetHigh: pair.assetHigh,
        reserveLow: pair.reserveLow.toString(),
        reserveHigh: pair.reserveHigh.toString(),
        totalShares: pair.totalShares.toString(),
        sharesByOwner: Object.fromEntries(
            Array.from(pair.sharesByOwner.entries()).map(([owner, v]) => [owner, v.toString()])
        ),
        createdAt: pair.createdAt,
        updatedAt: pair.updatedAt,
    };
}

export function pairFromData(data: PairData): Pair {
    return {
        key: data.key,
        assetLow: data.assetLow,
        assetHigh: data.assetHigh,
        reserveLow: BigInt(data.reserveLow),
        reserveHigh: BigInt(data.reserveHigh),
        totalShares: BigInt(data.totalShares),
        sharesByOwner: new Map(
            Object.entries(data.sharesByOwner).map(([owner, v]) => [owner, BigInt(v)])
        ),
        createdAt: data.createdAt,
        updatedAt: data.updatedAt,
    };
}
