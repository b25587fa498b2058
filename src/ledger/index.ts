/**
 * Ledger Module Exports
 */

export { LedgerError } from './TokenLedger.js';
export type { TokenLedger, LedgerErrorCode } from './TokenLedger.js';
export { InMemoryTokenLedger } from './InMemoryTokenLedger.js';
export type { LedgerData } from './InMemoryTokenLedger.js';
