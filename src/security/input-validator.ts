/**
 * Input Validator
 * Parses untrusted API and CLI input into engine arguments
 */

import { logger } from '../utils/logger.js';

// Maximum allowed lengths
const MAX_IDENTITY_LENGTH = 128;
const MAX_AMOUNT_DIGITS = 78;          // 2^256 has 78 decimal digits

const AMOUNT_REGEX = /^\d+$/;

export type ValidationResult<T> =
    | { valid: true; value: T }
    | { valid: false; error: string };

export class InputValidator {
    private log = logger.child('InputValidator');

    /**
     * Validate an asset or account identifier. Emptiness is left to the engine,
     * which reports it as NullIdentity.
     */
    validateIdentity(value: unknown, fieldName: string = 'address'): ValidationResult<string> {
        if (typeof value !== 'string') {
            return { valid: false, error: `${fieldName} must be a string` };
        }
        if (value.length > MAX_IDENTITY_LENGTH) {
            return { valid: false, error: `${fieldName} too long (max ${MAX_IDENTITY_LENGTH})` };
        }
        // Control characters are rejected
        if (/[\x00-\x1f\x7f]/.test(value)) {
            this.log.warn(`Rejected ${fieldName} with control characters`);
            return { valid: false, error: `${fieldName} contains invalid characters` };
        }
        return { valid: true, value };
    }

    /**
     * Parse a non-negative integer amount in base units.
     * Strings carry amounts beyond Number.MAX_SAFE_INTEGER.
     */
    parseAmount(value: unknown, fieldName: string = 'amount'): ValidationResult<bigint> {
        if (typeof value === 'number') {
            if (!Number.isSafeInteger(value)) {
                return { valid: false, error: `${fieldName} must be a safe integer (use a string for large amounts)` };
            }
            if (value < 0) {
                return { valid: false, error: `${fieldName} must be non-negative` };
            }
            return { valid: true, value: BigInt(value) };
        }
        if (typeof value !== 'string') {
            return { valid: false, error: `${fieldName} must be an integer string` };
        }
        const trimmed = value.trim();
        if (!AMOUNT_REGEX.test(trimmed)) {
            return { valid: false, error: `${fieldName} must be a non-negative integer` };
        }
        if (trimmed.length > MAX_AMOUNT_DIGITS) {
            return { valid: false, error: `${fieldName} too large` };
        }
        return { valid: true, value: BigInt(trimmed) };
    }

    /**
     * Optional amount; missing means zero
     */
    parseOptionalAmount(value: unknown, fieldName: string): ValidationResult<bigint> {
        if (value === undefined || value === null || value === '') {
            return { valid: true, value: 0n };
        }
        return this.parseAmount(value, fieldName);
    }

    /**
     * Deadline in unix seconds; missing means `now + defaultSeconds`
     */
    parseDeadline(value: unknown, now: number, defaultSeconds: number): ValidationResult<number> {
        if (value === undefined || value === null || value === '') {
            return { valid: true, value: now + defaultSeconds };
        }
        const parsed = typeof value === 'string' ? Number(value.trim()) : value;
        if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
            return { valid: false, error: 'deadline must be a unix timestamp in seconds' };
        }
        return { valid: true, value: parsed };
    }

    /**
     * Swap path: array of asset identifiers (length is checked by the engine)
     */
    parsePath(value: unknown): ValidationResult<string[]> {
        if (!Array.isArray(value)) {
            return { valid: false, error: 'path must be an array of asset identifiers' };
        }
        const path: string[] = [];
        for (const [i, entry] of value.entries()) {
            const result = this.validateIdentity(entry, `path[${i}]`);
            if (!result.valid) return result;
            path.push(result.value);
        }
        return { valid: true, value: path };
    }
}

export const inputValidator = new InputValidator();
