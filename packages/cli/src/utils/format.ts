import chalk from 'chalk';
import type { DownloadResponse, DownloadStatus } from '../types.js';

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[unit]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * "12.0 KB / 48.0 KB (25.0%)", or just the received size when the total is unknown
 */
export function formatProgress(received: number, total: number | null): string {
  if (total === null) {
    return formatBytes(received);
  }
  const percent = total === 0 ? 100 : (received / total) * 100;
  return `${formatBytes(received)} / ${formatBytes(total)} (${percent.toFixed(1)}%)`;
}

export function colorStatus(status: DownloadStatus): string {
  switch (status) {
    case 'completed':
      return chalk.green(status);
    case 'failed':
      return chalk.red(status);
    case 'in_progress':
      return chalk.cyan(status);
    default:
      return chalk.yellow(status);
  }
}

export function describeDownload(download: DownloadResponse): string[] {
  const lines = [
    `  ID:       ${download.id}`,
    `  Client:   ${download.client_id}`,
    `  File:     ${download.file_path}`,
    `  Status:   ${colorStatus(download.status)}`,
    `  Received: ${formatProgress(download.bytes_received, download.total_bytes)} in ${download.chunks_received} chunk(s)`,
    `  Created:  ${download.created_at}`,
  ];
  if (download.completed_at) {
    lines.push(`  Finished: ${download.completed_at}`);
  }
  if (download.error) {
    lines.push(`  Error:    ${chalk.red(download.error)}${download.error_code ? chalk.dim(` (${download.error_code})`) : ''}`);
  }
  return lines;
}
