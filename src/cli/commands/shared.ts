/**
 * Helpers shared by CLI commands: argument parsing and state loading
 */

import { config } from '../../config.js';
import { loadContext } from '../../context.js';
import type { PoolContext } from '../../context.js';
import { AmmError } from '../../pool/index.js';
import { LedgerError } from '../../ledger/index.js';
import { inputValidator } from '../../security/input-validator.js';
import { errorBox } from '../../utils/cli.js';

export interface DataOption {
    data?: string;
}

export function fail(message: string): never {
    console.log(errorBox(message));
    process.exit(1);
}

export function identityArg(value: string, field: string): string {
    const result = inputValidator.validateIdentity(value, field);
    if (!result.valid) fail(result.error);
    return result.value;
}

export function amountArg(value: string | undefined, field: string): bigint {
    const result = inputValidator.parseOptionalAmount(value, field);
    if (!result.valid) fail(result.error);
    return result.value;
}

export function deadlineArg(value: string | undefined): number {
    const now = Math.floor(Date.now() / 1000);
    const result = inputValidator.parseDeadline(value, now, config.pool.deadlineSeconds);
    if (!result.valid) fail(result.error);
    return result.value;
}

/**
 * Print engine and ledger rejections with their code and exit 1
 */
export function guard<T>(fn: () => T): T {
    try {
        return fn();
    } catch (error) {
        if (error instanceof AmmError || error instanceof LedgerError) {
            fail(`${error.code}: ${error.message}`);
        }
        throw error;
    }
}

/**
 * Load state, run `fn`, persist when `mutates` is set
 */
export function withContext<T>(options: DataOption, mutates: boolean, fn: (context: PoolContext) => T): T {
    const context = loadContext(options.data ?? config.storage.dataDir);
    return guard(() => {
        const result = fn(context);
        if (mutates) context.save();
        return result;
    });
}
