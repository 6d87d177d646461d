import type { FastifyInstance, FastifyPluginCallback } from 'fastify';
import { CLIENT_ID_PATTERN } from '@edgepull/protocol';
import { ControlPlaneError } from '../errors.js';
import type { TransferErrorCode, TransferSnapshot, TransferStatus } from '../transfers/index.js';

/** Longest source path accepted from callers */
const MAX_FILE_PATH_LENGTH = 4096;

interface DownloadParams {
  id: string;
}

interface CreateDownloadBody {
  client_id?: unknown;
  file_path?: unknown;
}

interface DownloadResponse {
  id: string;
  client_id: string;
  file_path: string;
  status: TransferStatus;
  chunks_received: number;
  bytes_received: number;
  total_bytes: number | null;
  created_at: string;
  completed_at: string | null;
  error: string | null;
  error_code: TransferErrorCode | null;
}

function downloadToResponse(transfer: TransferSnapshot): DownloadResponse {
  return {
    id: transfer.id,
    client_id: transfer.agentId,
    file_path: transfer.sourcePath,
    status: transfer.status,
    chunks_received: transfer.chunksReceived,
    bytes_received: transfer.bytesReceived,
    total_bytes: transfer.totalBytes,
    created_at: transfer.createdAt.toISOString(),
    completed_at: transfer.completedAt?.toISOString() ?? null,
    error: transfer.error,
    error_code: transfer.errorCode,
  };
}

function badRequest(message: string): ControlPlaneError {
  return new ControlPlaneError('BadRequest', 400, message);
}

export const downloadRoutes: FastifyPluginCallback = (
  fastify: FastifyInstance,
  _opts,
  done
): void => {
  const transfers = fastify.transfers;

  // Start a download from a connected agent
  fastify.post<{ Body: CreateDownloadBody | undefined }>('/download', (request, reply) => {
    const { client_id: clientId, file_path: filePath } = request.body ?? {};

    if (typeof clientId !== 'string' || !clientId) {
      throw badRequest('client_id is required');
    }

    if (!CLIENT_ID_PATTERN.test(clientId)) {
      throw badRequest(
        'client_id must be 1-128 characters and contain only alphanumeric, dot, underscore, or hyphen'
      );
    }

    if (typeof filePath !== 'string' || !filePath) {
      throw badRequest('file_path is required');
    }

    if (filePath.length > MAX_FILE_PATH_LENGTH) {
      throw badRequest(`file_path must not exceed ${MAX_FILE_PATH_LENGTH} characters`);
    }

    const transfer = transfers.create(clientId, filePath);
    request.log.info({ downloadId: transfer.id, clientId, filePath }, 'Download requested');

    return reply.status(202).send({
      download_id: transfer.id,
      status: transfer.status,
    });
  });

  // List all downloads
  fastify.get('/downloads', (_request, reply) => {
    const downloads = transfers.list();

    return reply.send({
      count: downloads.length,
      downloads: downloads.map(downloadToResponse),
    });
  });

  // Get a specific download
  fastify.get<{ Params: DownloadParams }>('/downloads/:id', (request, reply) => {
    const { id } = request.params;
    const transfer = transfers.status(id);

    if (!transfer) {
      return reply.status(404).send({
        error: 'TransferNotFound',
        message: `Download '${id}' not found`,
      });
    }

    return reply.send(downloadToResponse(transfer));
  });

  // Cancel a download
  fastify.delete<{ Params: DownloadParams }>('/downloads/:id', (request, reply) => {
    const { id } = request.params;
    const transfer = transfers.cancel(id);

    return reply.send(downloadToResponse(transfer));
  });

  done();
};
