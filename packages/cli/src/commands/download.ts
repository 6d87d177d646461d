/**
 * edgepull download <clientId> <filePath>
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { resolveServerUrl } from '../utils/config.js';
import { requestDownload, waitForDownload } from '../utils/control-plane.js';
import { describeDownload, formatProgress } from '../utils/format.js';
import type { GlobalOptions } from './options.js';

interface DownloadOptions {
  wait: boolean;
  interval: string;
}

export function registerDownloadCommand(program: Command): void {
  program
    .command('download')
    .description('Pull a file from a connected agent')
    .argument('<clientId>', 'Agent to pull from')
    .argument('<filePath>', 'Path on the agent (~ and $VAR are expanded there)')
    .option('--no-wait', 'Return as soon as the download is accepted')
    .option('--interval <ms>', 'Status polling interval in milliseconds', '2000')
    .action(async (clientId: string, filePath: string, options: DownloadOptions, command: Command) => {
      try {
        const serverUrl = resolveServerUrl(command.optsWithGlobals<GlobalOptions>().server);
        const intervalMs = parseInt(options.interval, 10);
        if (isNaN(intervalMs) || intervalMs < 1) {
          throw new Error('--interval must be a positive number of milliseconds');
        }

        const created = await requestDownload(serverUrl, clientId, filePath);
        console.log(chalk.blue(`Download ${created.download_id} ${created.status}`));

        if (!options.wait) {
          return;
        }

        let lastLine = '';
        const download = await waitForDownload(serverUrl, created.download_id, intervalMs, (update) => {
          const line = `  ${update.status}: ${formatProgress(update.bytes_received, update.total_bytes)}`;
          if (line !== lastLine) {
            console.log(chalk.dim(line));
            lastLine = line;
          }
        });

        console.log();
        for (const line of describeDownload(download)) {
          console.log(line);
        }

        if (download.status === 'failed') {
          process.exit(1);
        }
      } catch (error) {
        console.error(chalk.red('Download failed:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
