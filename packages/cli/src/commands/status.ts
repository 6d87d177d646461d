/**
 * edgepull status [downloadId]
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { resolveServerUrl } from '../utils/config.js';
import { getDownload, listDownloads } from '../utils/control-plane.js';
import { colorStatus, describeDownload, formatProgress } from '../utils/format.js';
import type { GlobalOptions } from './options.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show one download, or every download when no id is given')
    .argument('[downloadId]', 'Download to show')
    .action(async (downloadId: string | undefined, _options: unknown, command: Command) => {
      try {
        const serverUrl = resolveServerUrl(command.optsWithGlobals<GlobalOptions>().server);

        if (downloadId) {
          const download = await getDownload(serverUrl, downloadId);
          for (const line of describeDownload(download)) {
            console.log(line);
          }
          return;
        }

        const { count, downloads } = await listDownloads(serverUrl);
        if (count === 0) {
          console.log('No downloads.');
          return;
        }

        console.log(`Downloads (${count}):\n`);
        for (const download of downloads) {
          console.log(
            `  ${download.id}  ${colorStatus(download.status)}  ${download.client_id}:${download.file_path}  ` +
              chalk.dim(formatProgress(download.bytes_received, download.total_bytes))
          );
        }
      } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
