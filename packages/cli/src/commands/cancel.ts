/**
 * edgepull cancel <downloadId>
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { resolveServerUrl } from '../utils/config.js';
import { cancelDownload } from '../utils/control-plane.js';
import { colorStatus } from '../utils/format.js';
import type { GlobalOptions } from './options.js';

export function registerCancelCommand(program: Command): void {
  program
    .command('cancel')
    .description('Cancel a running download')
    .argument('<downloadId>', 'Download to cancel')
    .action(async (downloadId: string, _options: unknown, command: Command) => {
      try {
        const serverUrl = resolveServerUrl(command.optsWithGlobals<GlobalOptions>().server);
        const download = await cancelDownload(serverUrl, downloadId);

        if (download.error_code === 'Cancelled') {
          console.log(chalk.yellow(`Download ${download.id} cancelled.`));
        } else {
          console.log(`Download ${download.id} already ${colorStatus(download.status)}.`);
        }
      } catch (error) {
        console.error(chalk.red('Cancel failed:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
