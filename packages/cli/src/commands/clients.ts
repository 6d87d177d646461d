/**
 * edgepull clients
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { resolveServerUrl } from '../utils/config.js';
import { listClients } from '../utils/control-plane.js';
import type { GlobalOptions } from './options.js';

export function registerClientsCommand(program: Command): void {
  program
    .command('clients')
    .description('List connected agents')
    .action(async (_options: unknown, command: Command) => {
      try {
        const serverUrl = resolveServerUrl(command.optsWithGlobals<GlobalOptions>().server);
        const { count, clients } = await listClients(serverUrl);

        if (count === 0) {
          console.log('No agents connected.');
          return;
        }

        console.log(`Connected agents (${count}):\n`);
        for (const client of clients) {
          console.log(`  ${chalk.green('●')} ${client.client_id}`);
          console.log(chalk.dim(`      connected ${client.connected_at}, last seen ${client.last_seen}`));
        }
      } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
