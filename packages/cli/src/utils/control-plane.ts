/**
 * Typed calls to the control-plane endpoints.
 * Each throws with the server's message when the request is refused.
 */

import { apiRequest, type ApiResponse } from './api-client.js';
import {
  isTerminalStatus,
  type ClientListResponse,
  type CreateDownloadResponse,
  type DownloadListResponse,
  type DownloadResponse,
} from '../types.js';

function unwrap<T>(response: ApiResponse<T>): T {
  if (!response.ok || response.data === undefined) {
    throw new Error(response.error ?? `HTTP ${response.status}`);
  }
  return response.data;
}

export async function requestDownload(
  serverUrl: string,
  clientId: string,
  filePath: string
): Promise<CreateDownloadResponse> {
  return unwrap(
    await apiRequest<CreateDownloadResponse>(serverUrl, 'POST', '/api/download', {
      client_id: clientId,
      file_path: filePath,
    })
  );
}

export async function getDownload(serverUrl: string, downloadId: string): Promise<DownloadResponse> {
  return unwrap(
    await apiRequest<DownloadResponse>(serverUrl, 'GET', `/api/downloads/${encodeURIComponent(downloadId)}`)
  );
}

export async function listDownloads(serverUrl: string): Promise<DownloadListResponse> {
  return unwrap(await apiRequest<DownloadListResponse>(serverUrl, 'GET', '/api/downloads'));
}

export async function cancelDownload(serverUrl: string, downloadId: string): Promise<DownloadResponse> {
  return unwrap(
    await apiRequest<DownloadResponse>(serverUrl, 'DELETE', `/api/downloads/${encodeURIComponent(downloadId)}`)
  );
}

export async function listClients(serverUrl: string): Promise<ClientListResponse> {
  return unwrap(await apiRequest<ClientListResponse>(serverUrl, 'GET', '/api/clients'));
}

/**
 * Poll a download until it is completed or failed.
 */
export async function waitForDownload(
  serverUrl: string,
  downloadId: string,
  intervalMs: number,
  onUpdate?: (download: DownloadResponse) => void
): Promise<DownloadResponse> {
  for (;;) {
    const download = await getDownload(serverUrl, downloadId);
    onUpdate?.(download);
    if (isTerminalStatus(download.status)) {
      return download;
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}
