/**
 * Ledger CLI Command
 * Balances, allowances and testnet minting
 */

import { Command } from 'commander';
import { config } from '../../config.js';
import { box, rows, success, sym } from '../../utils/cli.js';
import { amountArg, fail, identityArg, withContext } from './shared.js';
import type { DataOption } from './shared.js';

interface MintOptions extends DataOption {
    asset: string;
    to: string;
    amount: string;
}

interface ApproveOptions extends DataOption {
    asset: string;
    owner: string;
    spender?: string;
    amount: string;
}

interface TransferOptions extends DataOption {
    asset: string;
    from: string;
    to: string;
    amount: string;
}

interface BalanceOptions extends DataOption {
    asset: string;
    owner: string;
}

export const ledgerCommand = new Command('ledger')
    .description('Token ledger operations');

ledgerCommand
    .command('mint')
    .description('Mint test tokens (testnet only)')
    .requiredOption('--asset <asset>', 'Asset to mint')
    .requiredOption('--to <identity>', 'Recipient')
    .requiredOption('--amount <amount>', 'Amount in base units')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: MintOptions) => {
        if (!config.faucet.enabled) {
            fail('Minting is only available on testnet');
        }
        const asset = identityArg(options.asset, 'asset');
        const to = identityArg(options.to, 'to');
        const amount = amountArg(options.amount, 'amount');

        withContext(options, true, ({ ledger }) => {
            ledger.mint(asset, to, amount);
            success(`Minted ${amount} ${asset} ${sym.arrow} ${to} (balance ${ledger.balanceOf(asset, to)})`);
        });
    });

ledgerCommand
    .command('approve')
    .description('Allow a spender (the pool account by default) to move tokens')
    .requiredOption('--asset <asset>', 'Asset')
    .requiredOption('--owner <identity>', 'Token owner')
    .requiredOption('--amount <amount>', 'Allowance in base units')
    .option('--spender <identity>', 'Spender', config.pool.account)
    .option('-d, --data <path>', 'Data directory path')
    .action((options: ApproveOptions) => {
        const asset = identityArg(options.asset, 'asset');
        const owner = identityArg(options.owner, 'owner');
        const spender = identityArg(options.spender ?? config.pool.account, 'spender');
        const amount = amountArg(options.amount, 'amount');

        withContext(options, true, ({ ledger }) => {
            ledger.approve(asset, owner, spender, amount);
            success(`${owner} approved ${spender} for ${amount} ${asset}`);
        });
    });

ledgerCommand
    .command('transfer')
    .description('Move tokens between identities')
    .requiredOption('--asset <asset>', 'Asset')
    .requiredOption('--from <identity>', 'Sender')
    .requiredOption('--to <identity>', 'Recipient')
    .requiredOption('--amount <amount>', 'Amount in base units')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: TransferOptions) => {
        const asset = identityArg(options.asset, 'asset');
        const from = identityArg(options.from, 'from');
        const to = identityArg(options.to, 'to');
        const amount = amountArg(options.amount, 'amount');

        withContext(options, true, ({ ledger }) => {
            ledger.transfer(asset, from, to, amount);
            success(`Sent ${amount} ${asset} ${from} ${sym.arrow} ${to}`);
        });
    });

ledgerCommand
    .command('balance')
    .description('Show a balance and the allowance granted to the pool')
    .requiredOption('--asset <asset>', 'Asset')
    .requiredOption('--owner <identity>', 'Owner')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: BalanceOptions) => {
        const asset = identityArg(options.asset, 'asset');
        const owner = identityArg(options.owner, 'owner');

        withContext(options, false, ({ ledger }) => {
            console.log(box(rows([
                ['Owner', owner],
                ['Balance', `${ledger.balanceOf(asset, owner)} ${asset}`],
                ['Pool allowance', ledger.allowance(asset, owner, config.pool.account).toString()],
            ]), `💰 ${asset}`));
        });
    });
