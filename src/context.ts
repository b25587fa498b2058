/**
 * Wires the ledger, the pair registry and the engine to one data directory.
 * Shared by the CLI and the HTTP server.
 */

import { config } from './config.js';
import { InMemoryTokenLedger } from './ledger/index.js';
import { AmmEngine, PairRegistry } from './pool/index.js';
import { Storage } from './storage/index.js';

export interface PoolContext {
    engine: AmmEngine;
    ledger: InMemoryTokenLedger;
    registry: PairRegistry;
    storage: Storage;
    save(): void;
}

export function loadContext(dataDir: string = config.storage.dataDir, clock?: () => number): PoolContext {
    const storage = new Storage(dataDir);

    const ledger = new InMemoryTokenLedger();
    const ledgerData = storage.loadLedger();
    if (ledgerData) ledger.loadFromData(ledgerData);

    const registry = new PairRegistry();
    const pairsData = storage.loadPairs();
    if (pairsData) registry.loadFromData(pairsData);

    const engine = new AmmEngine({
        ledger,
        registry,
        poolAccount: config.pool.account,
        clock,
    });

    return {
        engine,
        ledger,
        registry,
        storage,
        save() {
            storage.savePairs(registry.toJSON());
            storage.saveLedger(ledger.toJSON());
        },
    };
}
