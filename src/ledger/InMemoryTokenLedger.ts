/**
 * In-memory Token Ledger
 *
 * Backs the CLI, the HTTP API and the tests. Holds balances and allowances
 * for any number of assets; minting exists for testnet bootstrap only.
 */

import { LedgerError } from './TokenLedger.js';
import type { TokenLedger } from './TokenLedger.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Ledger');

// BigInt as string for JSON
export interface LedgerData {
    balances: Record<string, Record<string, string>>;                     // asset -> owner -> amount
    allowances: Record<string, Record<string, Record<string, string>>>;   // asset -> owner -> spender -> amount
}

function short(address: string): string {
    return address.length > 16 ? `${address.slice(0, 16)}...` : address;
}

export class InMemoryTokenLedger implements TokenLedger {
    private balances: Map<string, Map<string, bigint>> = new Map();
    private allowances: Map<string, Map<string, Map<string, bigint>>> = new Map();

    balanceOf(asset: string, owner: string): bigint {
        return this.balances.get(asset)?.get(owner) ?? 0n;
    }

    allowance(asset: string, owner: string, spender: string): bigint {
        return this.allowances.get(asset)?.get(owner)?.get(spender) ?? 0n;
    }

    /**
     * Create `amount` of `asset` out of thin air (testnet faucet)
     */
    mint(asset: string, to: string, amount: bigint): void {
        this.requirePositive(amount);
        this.setBalance(asset, to, this.balanceOf(asset, to) + amount);
        log.info(`💧 Minted ${amount} ${asset} → ${short(to)}`);
    }

    approve(asset: string, owner: string, spender: string, amount: bigint): void {
        if (amount < 0n) {
            throw new LedgerError('InvalidAmount', `Allowance must be non-negative, got ${amount}`);
        }
        let owners = this.allowances.get(asset);
        if (!owners) {
            owners = new Map();
            this.allowances.set(asset, owners);
        }
        let spenders = owners.get(owner);
        if (!spenders) {
            spenders = new Map();
            owners.set(owner, spenders);
        }
        spenders.set(spender, amount);
        log.debug(`Approved ${short(spender)} for ${amount} ${asset} of ${short(owner)}`);
    }

    transfer(asset: string, from: string, to: string, amount: bigint): void {
        this.requirePositive(amount);
        this.move(asset, from, to, amount);
    }

    transferFrom(asset: string, spender: string, from: string, to: string, amount: bigint): void {
        this.requirePositive(amount);

        const allowed = this.allowance(asset, from, spender);
        if (allowed < amount) {
            throw new LedgerError(
                'InsufficientAllowance',
                `Allowance of ${short(spender)} on ${asset} is ${allowed}, needs ${amount}`
            );
        }

        // Balance is checked before the allowance is consumed
        this.move(asset, from, to, amount);
        this.approve(asset, from, spender, allowed - amount);
    }

    toJSON(): LedgerData {
        const balances: LedgerData['balances'] = {};
        for (const [asset, owners] of this.balances) {
            balances[asset] = Object.fromEntries(
                Array.from(owners.entries()).map(([owner, v]) => [owner, v.toString()])
            );
        }

        const allowances: LedgerData['allowances'] = {};
        for (const [asset, owners] of this.allowances) {
            const byOwner: Record<string, Record<string, string>> = {};
            for (const [owner, spenders] of owners) {
                byOwner[owner] = Object.fromEntries(
                    Array.from(spenders.entries()).map(([spender, v]) => [spender, v.toString()])
                );
            }
            allowances[asset] = byOwner;
        }

        return { balances, allowances };
    }

    loadFromData(data: LedgerData): void {
        this.balances.clear();
        this.allowances.clear();

        for (const [asset, owners] of Object.entries(data.balances)) {
            this.balances.set(
                asset,
                new Map(Object.entries(owners).map(([owner, v]) => [owner, BigInt(v)]))
            );
        }
        for (const [asset, owners] of Object.entries(data.allowances)) {
            const byOwner = new Map<string, Map<string, bigint>>();
            for (const [owner, spenders] of Object.entries(owners)) {
                byOwner.set(
                    owner,
                    new Map(Object.entries(spenders).map(([spender, v]) => [spender, BigInt(v)]))
                );
            }
            this.allowances.set(asset, byOwner);
        }

        log.info(`📂 Loaded balances for ${this.balances.size} assets`);
    }

    private move(asset: string, from: string, to: string, amount: bigint): void {
        const fromBalance = this.balanceOf(asset, from);
        if (fromBalance < amount) {
            throw new LedgerError(
                'InsufficientFunds',
                `Balance of ${short(from)} on ${asset} is ${fromBalance}, needs ${amount}`
            );
        }
        this.setBalance(asset, from, fromBalance - amount);
        this.setBalance(asset, to, this.balanceOf(asset, to) + amount);
    }

    private setBalance(asset: string, owner: string, amount: bigint): void {
        let owners = this.balances.get(asset);
        if (!owners) {
            owners = new Map();
            this.balances.set(asset, owners);
        }
        if (amount === 0n) {
            owners.delete(owner);
        } else {
            owners.set(owner, amount);
        }
    }

    private requirePositive(amount: bigint): void {
        if (amount <= 0n) {
            throw new LedgerError('InvalidAmount', `Amount must be positive, got ${amount}`);
        }
    }
}
