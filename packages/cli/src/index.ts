#!/usr/bin/env node

/**
 * edgepull CLI - agent runtime and download operator commands
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { registerAgentCommand } from './commands/agent.js';
import { registerDownloadCommand } from './commands/download.js';
import { registerStatusCommand } from './commands/status.js';
import { registerClientsCommand } from './commands/clients.js';
import { registerCancelCommand } from './commands/cancel.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
  .name('edgepull')
  .description('Pull files from on-premise agents')
  .version(pkg.version)
  .option('--server <url>', 'Server base URL (default: $EDGEPULL_SERVER_URL or http://localhost:8080)');

registerAgentCommand(program);
registerDownloadCommand(program);
registerStatusCommand(program);
registerClientsCommand(program);
registerCancelCommand(program);

await program.parseAsync();
