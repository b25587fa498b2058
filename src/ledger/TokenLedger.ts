/**
 * Token Ledger contract consumed by the AMM engine.
 *
 * Balances and allowances are kept per asset. Transfers either move the full
 * amount or throw a LedgerError and move nothing.
 */

export type LedgerErrorCode = 'InsufficientFunds' | 'InsufficientAllowance' | 'InvalidAmount';

export class LedgerError extends Error {
    readonly code: LedgerErrorCode;

    constructor(code: LedgerErrorCode, message: string) {
        super(message);
        this.name = 'LedgerError';
        this.code = code;
    }
}

export interface TokenLedger {
    balanceOf(asset: string, owner: string): bigint;
    allowance(asset: string, owner: string, spender: string): bigint;
    transfer(asset: string, from: string, to: string, amount: bigint): void;
    /**
     * Move `amount` from `from` to `to` on behalf of `spender`, consuming allowance
     */
    transferFrom(asset: string, spender: string, from: string, to: string, amount: bigint): void;
}
