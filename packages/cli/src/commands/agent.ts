/**
 * edgepull agent: run the on-premise agent
 *
 * Connects out to the server, serves file requests and reconnects after
 * the connection drops. Runs until interrupted.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { hostname } from 'node:os';
import { CLIENT_ID_PATTERN } from '@edgepull/protocol';
import { AgentClient, type AgentEvent } from '../agent/index.js';
import { resolveServerUrl } from '../utils/config.js';
import { formatProgress } from '../utils/format.js';
import type { GlobalOptions } from './options.js';

interface AgentOptions {
  clientId?: string;
  reconnectDelay: string;
}

function parsePositive(value: string, flag: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive number`);
  }
  return parsed;
}

export function printAgentEvent(event: AgentEvent): void {
  switch (event.type) {
    case 'status':
      if (event.status === 'connected') {
        console.log(chalk.green('Connected.'));
      } else if (event.status === 'reconnecting') {
        console.log(chalk.yellow('Connection lost. Reconnecting...'));
      } else if (event.status === 'stopped') {
        console.log(chalk.dim('Agent stopped.'));
      }
      break;
    case 'transfer_started':
      console.log(chalk.blue(`[${event.transferId}] sending ${event.path}`));
      break;
    case 'transfer_progress':
      console.log(chalk.dim(`[${event.transferId}] ${formatProgress(event.bytesSent, event.totalBytes)}`));
      break;
    case 'transfer_finished': {
      const { result } = event;
      if (result.outcome === 'sent') {
        console.log(chalk.green(`[${result.transferId}] sent ${result.bytes} bytes in ${result.chunks} chunk(s)`));
      } else if (result.outcome === 'cancelled') {
        console.log(chalk.yellow(`[${result.transferId}] cancelled: ${result.error ?? 'no reason given'}`));
      } else {
        console.log(chalk.red(`[${result.transferId}] aborted: ${result.error ?? 'unknown error'}`));
      }
      break;
    }
    case 'server_error':
      console.error(chalk.red(`Server error ${event.code}: ${event.message}`));
      break;
    case 'connection_error':
      console.error(chalk.red(`Connection error: ${event.message}`));
      break;
  }
}

export function registerAgentCommand(program: Command): void {
  program
    .command('agent')
    .description('Run the agent: keep a connection to the server and serve file requests')
    .option('--client-id <id>', 'Agent identifier (default: this host name)')
    .option('--reconnect-delay <ms>', 'Delay before reconnecting in milliseconds', '5000')
    .action(async (options: AgentOptions, command: Command) => {
      try {
        const serverUrl = resolveServerUrl(command.optsWithGlobals<GlobalOptions>().server);
        const clientId = options.clientId ?? hostname();
        if (!CLIENT_ID_PATTERN.test(clientId)) {
          throw new Error(`Invalid client id "${clientId}": use letters, digits, dot, underscore or hyphen`);
        }

        const client = new AgentClient({
          serverUrl,
          clientId,
          reconnectDelayMs: parsePositive(options.reconnectDelay, '--reconnect-delay'),
        });
        client.onEvent(printAgentEvent);

        console.log(chalk.blue(`Agent ${clientId} connecting to ${serverUrl}`));
        client.start();

        await new Promise<void>((resolve) => {
          const shutdown = (): void => {
            process.off('SIGINT', shutdown);
            process.off('SIGTERM', shutdown);
            client.stop().then(resolve, (error: unknown) => {
              console.error(chalk.red('Error while stopping:'), error instanceof Error ? error.message : error);
              resolve();
            });
          };
          process.on('SIGINT', shutdown);
          process.on('SIGTERM', shutdown);
        });
      } catch (error) {
        console.error(chalk.red('Agent failed:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
