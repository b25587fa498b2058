/**
 * Pool CLI Command
 * Liquidity and swap operations against the pairs stored in the data directory
 */

import { Command } from 'commander';
import { PRICE_SCALE, getAmountIn, getAmountOut } from '../../pool/index.js';
import { box, c, formatScaled, rows, success, successBox, sym } from '../../utils/cli.js';
import { amountArg, deadlineArg, guard, identityArg, withContext } from './shared.js';
import type { DataOption } from './shared.js';

interface PairOptions extends DataOption {
    assetA: string;
    assetB: string;
}

interface AddOptions extends PairOptions {
    sender: string;
    amountA: string;
    amountB: string;
    minA?: string;
    minB?: string;
    to?: string;
    deadline?: string;
}

interface RemoveOptions extends PairOptions {
    sender: string;
    shares: string;
    minA?: string;
    minB?: string;
    to?: string;
    deadline?: string;
}

interface SwapOptions extends DataOption {
    sender: string;
    from: string;
    to: string;
    recipient?: string;
    deadline?: string;
}

interface SwapExactInOptions extends SwapOptions {
    amountIn: string;
    minOut?: string;
}

interface SwapExactOutOptions extends SwapOptions {
    amountOut: string;
    maxIn: string;
}

interface PriceOptions extends DataOption {
    base: string;
    quote: string;
}

interface QuoteOptions extends DataOption {
    from: string;
    to: string;
    amount: string;
}

interface FormulaOptions {
    amount: string;
    reserveIn: string;
    reserveOut: string;
}

interface SharesOptions extends PairOptions {
    owner: string;
}

export const poolCommand = new Command('pool')
    .description('Liquidity pool operations');

// ========== INFO ==========

poolCommand
    .command('pairs')
    .description('List every pair')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: DataOption) => {
        withContext(options, false, ({ engine }) => {
            const pairs = engine.listPairs();
            if (pairs.length === 0) {
                console.log(box(`No pairs yet.\nUse ${c.highlight('pairswap pool add')} to create one.`, `${sym.drop} Pairs`));
                return;
            }
            const lines = pairs.map(pair =>
                `${sym.bullet} ${c.bold(`${pair.assetLow}/${pair.assetHigh}`)}  ` +
                `${c.label('reserves')} ${pair.reserveLow} / ${pair.reserveHigh}  ` +
                `${c.label('shares')} ${pair.totalShares}`
            );
            console.log(box(lines.join('\n'), `${sym.drop} Pairs (${pairs.length})`));
        });
    });

poolCommand
    .command('info')
    .description('Show one pair')
    .requiredOption('--asset-a <asset>', 'First asset')
    .requiredOption('--asset-b <asset>', 'Second asset')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: PairOptions) => {
        const assetA = identityArg(options.assetA, 'assetA');
        const assetB = identityArg(options.assetB, 'assetB');

        withContext(options, false, ({ engine }) => {
            const { reserveA, reserveB } = engine.getReserves(assetA, assetB);
            const pair = engine.getPair(assetA, assetB);
            const entries: Array<[string, string]> = [
                ['Key', pair?.key ?? ''],
                [`Reserve ${assetA}`, reserveA.toString()],
                [`Reserve ${assetB}`, reserveB.toString()],
                ['Total shares', (pair?.totalShares ?? 0n).toString()],
                ['Providers', String(pair?.sharesByOwner.size ?? 0)],
            ];
            if (reserveA > 0n) {
                entries.push([`Price ${assetA}`, `${formatScaled(engine.getPrice(assetA, assetB), PRICE_SCALE)} ${assetB}`]);
            }
            console.log(box(rows(entries), `${sym.drop} ${assetA}/${assetB}`));
        });
    });

poolCommand
    .command('price')
    .description('Price of one base unit in the quote asset (scaled by 1e18)')
    .requiredOption('--base <asset>', 'Base asset')
    .requiredOption('--quote <asset>', 'Quote asset')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: PriceOptions) => {
        const base = identityArg(options.base, 'base');
        const quoteAsset = identityArg(options.quote, 'quote');

        withContext(options, false, ({ engine }) => {
            const price = engine.getPrice(base, quoteAsset);
            console.log(box(rows([
                ['Scaled', price.toString()],
                ['Price', `${formatScaled(price, PRICE_SCALE)} ${quoteAsset} per ${base}`],
            ]), `${sym.chart} Price`));
        });
    });

poolCommand
    .command('shares')
    .description('Share balance of an owner')
    .requiredOption('--owner <identity>', 'Share owner')
    .requiredOption('--asset-a <asset>', 'First asset')
    .requiredOption('--asset-b <asset>', 'Second asset')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: SharesOptions) => {
        const owner = identityArg(options.owner, 'owner');
        const assetA = identityArg(options.assetA, 'assetA');
        const assetB = identityArg(options.assetB, 'assetB');

        withContext(options, false, ({ engine }) => {
            const shares = engine.getShareBalance(assetA, assetB, owner);
            const total = engine.getPair(assetA, assetB)?.totalShares ?? 0n;
            console.log(box(rows([
                ['Owner', owner],
                ['Shares', shares.toString()],
                ['Total shares', total.toString()],
            ]), `${sym.drop} ${assetA}/${assetB}`));
        });
    });

// ========== QUOTES ==========

poolCommand
    .command('quote')
    .description('Quote a swap against current reserves without executing')
    .requiredOption('--from <asset>', 'Asset to sell')
    .requiredOption('--to <asset>', 'Asset to buy')
    .requiredOption('--amount <amount>', 'Amount to sell')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: QuoteOptions) => {
        const assetIn = identityArg(options.from, 'from');
        const assetOut = identityArg(options.to, 'to');
        const amountIn = amountArg(options.amount, 'amount');

        withContext(options, false, ({ engine }) => {
            const { reserveA, reserveB } = engine.getReserves(assetIn, assetOut);
            const amountOut = engine.getAmountOut(amountIn, reserveA, reserveB);
            console.log(box(rows([
                ['Input', `${amountIn} ${assetIn}`],
                ['Output', `${amountOut} ${assetOut}`],
                ['Reserves', `${reserveA} / ${reserveB}`],
            ]), `${sym.swap} Swap Quote`));
        });
    });

poolCommand
    .command('amount-out')
    .description('Output for an exact input against given reserves')
    .requiredOption('--amount <amount>', 'Input amount')
    .requiredOption('--reserve-in <amount>', 'Input reserve')
    .requiredOption('--reserve-out <amount>', 'Output reserve')
    .action((options: FormulaOptions) => {
        const amountIn = amountArg(options.amount, 'amount');
        const reserveIn = amountArg(options.reserveIn, 'reserveIn');
        const reserveOut = amountArg(options.reserveOut, 'reserveOut');

        console.log(guard(() => getAmountOut(amountIn, reserveIn, reserveOut)).toString());
    });

poolCommand
    .command('amount-in')
    .description('Input required for an exact output against given reserves')
    .requiredOption('--amount <amount>', 'Output amount')
    .requiredOption('--reserve-in <amount>', 'Input reserve')
    .requiredOption('--reserve-out <amount>', 'Output reserve')
    .action((options: FormulaOptions) => {
        const amountOut = amountArg(options.amount, 'amount');
        const reserveIn = amountArg(options.reserveIn, 'reserveIn');
        const reserveOut = amountArg(options.reserveOut, 'reserveOut');

        console.log(guard(() => getAmountIn(amountOut, reserveIn, reserveOut)).toString());
    });

// ========== LIQUIDITY ==========

poolCommand
    .command('add')
    .description('Add liquidity (the sender must approve the pool account first)')
    .requiredOption('--sender <identity>', 'Provider paying both assets')
    .requiredOption('--asset-a <asset>', 'First asset')
    .requiredOption('--asset-b <asset>', 'Second asset')
    .requiredOption('--amount-a <amount>', 'Desired amount of asset A')
    .requiredOption('--amount-b <amount>', 'Desired amount of asset B')
    .option('--min-a <amount>', 'Minimum amount of asset A', '0')
    .option('--min-b <amount>', 'Minimum amount of asset B', '0')
    .option('--to <identity>', 'Share recipient (defaults to sender)')
    .option('--deadline <unix>', 'Deadline in unix seconds')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: AddOptions) => {
        const sender = identityArg(options.sender, 'sender');
        const params = {
            sender,
            assetA: identityArg(options.assetA, 'assetA'),
            assetB: identityArg(options.assetB, 'assetB'),
            amountADesired: amountArg(options.amountA, 'amountA'),
            amountBDesired: amountArg(options.amountB, 'amountB'),
            amountAMin: amountArg(options.minA, 'minA'),
            amountBMin: amountArg(options.minB, 'minB'),
            to: identityArg(options.to ?? sender, 'to'),
            deadline: deadlineArg(options.deadline),
        };

        withContext(options, true, ({ engine }) => {
            const result = engine.addLiquidity(params);
            console.log(successBox(rows([
                [`Deposited ${params.assetA}`, result.amountA.toString()],
                [`Deposited ${params.assetB}`, result.amountB.toString()],
                ['Shares minted', result.shares.toString()],
                ['Recipient', params.to],
            ]), `${sym.success} Liquidity Added`));
        });
    });

poolCommand
    .command('remove')
    .description('Burn shares and withdraw both assets')
    .requiredOption('--sender <identity>', 'Share owner')
    .requiredOption('--asset-a <asset>', 'First asset')
    .requiredOption('--asset-b <asset>', 'Second asset')
    .requiredOption('--shares <amount>', 'Shares to burn')
    .option('--min-a <amount>', 'Minimum amount of asset A', '0')
    .option('--min-b <amount>', 'Minimum amount of asset B', '0')
    .option('--to <identity>', 'Recipient (defaults to sender)')
    .option('--deadline <unix>', 'Deadline in unix seconds')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: RemoveOptions) => {
        const sender = identityArg(options.sender, 'sender');
        const params = {
            sender,
            assetA: identityArg(options.assetA, 'assetA'),
            assetB: identityArg(options.assetB, 'assetB'),
            shares: amountArg(options.shares, 'shares'),
            amountAMin: amountArg(options.minA, 'minA'),
            amountBMin: amountArg(options.minB, 'minB'),
            to: identityArg(options.to ?? sender, 'to'),
            deadline: deadlineArg(options.deadline),
        };

        withContext(options, true, ({ engine }) => {
            const result = engine.removeLiquidity(params);
            console.log(successBox(rows([
                ['Shares burned', params.shares.toString()],
                [`Received ${params.assetA}`, result.amountA.toString()],
                [`Received ${params.assetB}`, result.amountB.toString()],
            ]), `${sym.success} Liquidity Removed`));
        });
    });

// ========== SWAPS ==========

poolCommand
    .command('swap')
    .description('Sell an exact amount of one asset for another')
    .requiredOption('--sender <identity>', 'Trader paying the input')
    .requiredOption('--from <asset>', 'Asset to sell')
    .requiredOption('--to <asset>', 'Asset to buy')
    .requiredOption('--amount-in <amount>', 'Exact input amount')
    .option('--min-out <amount>', 'Minimum output (slippage bound)', '0')
    .option('--recipient <identity>', 'Output recipient (defaults to sender)')
    .option('--deadline <unix>', 'Deadline in unix seconds')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: SwapExactInOptions) => {
        const sender = identityArg(options.sender, 'sender');
        const path = [identityArg(options.from, 'from'), identityArg(options.to, 'to')];
        const amountIn = amountArg(options.amountIn, 'amountIn');
        const amountOutMin = amountArg(options.minOut, 'minOut');
        const to = identityArg(options.recipient ?? sender, 'recipient');
        const deadline = deadlineArg(options.deadline);

        withContext(options, true, ({ engine }) => {
            const [paid, received] = engine.swapExactTokensForTokens({
                sender, amountIn, amountOutMin, path, to, deadline,
            });
            success(`Swapped ${paid} ${path[0]} ${sym.arrow} ${received} ${path[1]}`);
        });
    });

poolCommand
    .command('swap-exact-out')
    .description('Buy an exact amount of one asset, paying at most a maximum')
    .requiredOption('--sender <identity>', 'Trader paying the input')
    .requiredOption('--from <asset>', 'Asset to sell')
    .requiredOption('--to <asset>', 'Asset to buy')
    .requiredOption('--amount-out <amount>', 'Exact output amount')
    .requiredOption('--max-in <amount>', 'Maximum input (slippage bound)')
    .option('--recipient <identity>', 'Output recipient (defaults to sender)')
    .option('--deadline <unix>', 'Deadline in unix seconds')
    .option('-d, --data <path>', 'Data directory path')
    .action((options: SwapExactOutOptions) => {
        const sender = identityArg(options.sender, 'sender');
        const path = [identityArg(options.from, 'from'), identityArg(options.to, 'to')];
        const amountOut = amountArg(options.amountOut, 'amountOut');
        const amountInMax = amountArg(options.maxIn, 'maxIn');
        const to = identityArg(options.recipient ?? sender, 'recipient');
        const deadline = deadlineArg(options.deadline);

        withContext(options, true, ({ engine }) => {
            const [paid, received] = engine.swapTokensForExactTokens({
                sender, amountOut, amountInMax, path, to, deadline,
            });
            success(`Swapped ${paid} ${path[0]} ${sym.arrow} ${received} ${path[1]}`);
        });
    });
