import { AmmError } from '../pool/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('TxGuard');

/**
 * Reentrancy guard keyed by pair. Each engine owns its own set of locks.
 */
export class PairLocks {
    private activeLocks = new Set<string>();

    acquire(key: string): boolean {
        if (this.activeLocks.has(key)) {
            log.warn(`🔒 Reentrancy blocked for ${key.slice(0, 16)}...`);
            return false;
        }
        this.activeLocks.add(key);
        return true;
    }

    release(key: string): void {
        this.activeLocks.delete(key);
    }

    isLocked(key: string): boolean {
        return this.activeLocks.has(key);
    }

    /**
     * Run `fn` while holding the lock for one pair. A nested call for the same
     * pair (a ledger calling back into the engine) fails with `Locked`.
     */
    withPairLock<T>(key: string, fn: () => T): T {
        if (!this.acquire(key)) throw new AmmError('Locked');
        try {
            return fn();
        } finally {
            this.release(key);
        }
    }
}
