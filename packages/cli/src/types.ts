/**
 * Response bodies of the control-plane HTTP API
 */

export type DownloadStatus = 'pending' | 'dispatched' | 'in_progress' | 'completed' | 'failed';

export interface DownloadResponse {
  id: string;
  client_id: string;
  file_path: string;
  status: DownloadStatus;
  chunks_received: number;
  bytes_received: number;
  total_bytes: number | null;
  created_at: string;
  completed_at: string | null;
  error: string | null;
  error_code: string | null;
}

export interface CreateDownloadResponse {
  download_id: string;
  status: DownloadStatus;
}

export interface DownloadListResponse {
  count: number;
  downloads: DownloadResponse[];
}

export interface ClientResponse {
  client_id: string;
  liveness: 'connected' | 'disconnected';
  connected_at: string;
  last_seen: string;
}

export interface ClientListResponse {
  count: number;
  clients: ClientResponse[];
}

export function isTerminalStatus(status: DownloadStatus): boolean {
  return status === 'completed' || status === 'failed';
}
