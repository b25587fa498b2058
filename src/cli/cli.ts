#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { poolCommand } from './commands/pool.js';
import { ledgerCommand } from './commands/ledger.js';
import { startServer } from '../api/server.js';
import { config } from '../config.js';

const program = new Command();

program
    .name('pairswap')
    .description('Constant-product liquidity pools over a token ledger')
    .version('1.0.0');

program.addCommand(poolCommand);
program.addCommand(ledgerCommand);

program
    .command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <number>', 'API server port', String(config.network.apiPort))
    .option('-d, --data <path>', 'Data directory path', config.storage.dataDir)
    .action((options: { port: string; data: string }) => {
        startServer(parseInt(options.port, 10), options.data);
    });

program.parse();
