import { describe, it, expect, afterEach, vi } from 'vitest';
import { apiRequest } from '../utils/api-client.js';
import { cancelDownload, listClients, requestDownload, waitForDownload } from '../utils/control-plane.js';
import type { DownloadResponse, DownloadStatus } from '../types.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function download(status: DownloadStatus, bytes = 0): DownloadResponse {
  return {
    id: 'd-1',
    client_id: 'agent-1',
    file_path: '/data/file',
    status,
    chunks_received: bytes > 0 ? 1 : 0,
    bytes_received: bytes,
    total_bytes: 10,
    created_at: '2024-05-01T10:00:00.000Z',
    completed_at: status === 'completed' ? '2024-05-01T10:00:01.000Z' : null,
    error: null,
    error_code: null,
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('apiRequest', () => {
  it('should send a JSON body and return parsed data', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ download_id: 'd-1', status: 'dispatched' }, 202));
    vi.stubGlobal('fetch', fetchMock);

    const res = await apiRequest('http://server', 'POST', 'api/download', { client_id: 'a' });

    expect(res).toEqual({ ok: true, status: 202, data: { download_id: 'd-1', status: 'dispatched' } });
    expect(fetchMock).toHaveBeenCalledWith('http://server/api/download', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"client_id":"a"}',
    });
  });

  it('should surface the server message on an error status', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => jsonResponse({ error: 'AgentNotConnected', message: "Agent 'x' is not connected" }, 404))
    );

    const res = await apiRequest('http://server', 'GET', '/api/downloads/x');

    expect(res).toEqual({ ok: false, status: 404, error: "Agent 'x' is not connected" });
  });

  it('should fall back to the status code when the body is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('bad gateway', { status: 502 })));

    const res = await apiRequest('http://server', 'GET', '/api/clients');

    expect(res).toEqual({ ok: false, status: 502, error: 'HTTP 502' });
  });
});

describe('control plane calls', () => {
  it('should post the snake_case download request', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ download_id: 'd-1', status: 'dispatched' }, 202));
    vi.stubGlobal('fetch', fetchMock);

    const created = await requestDownload('http://server', 'agent-1', '~/report.csv');

    expect(created).toEqual({ download_id: 'd-1', status: 'dispatched' });
    expect(fetchMock).toHaveBeenCalledWith(
      'http://server/api/download',
      expect.objectContaining({ body: '{"client_id":"agent-1","file_path":"~/report.csv"}' })
    );
  });

  it('should throw the server message when the request is refused', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => jsonResponse({ error: 'AgentBusy', message: "Agent 'agent-1' already has a transfer" }, 409))
    );

    await expect(requestDownload('http://server', 'agent-1', '/x')).rejects.toThrow(
      "Agent 'agent-1' already has a transfer"
    );
  });

  it('should encode the download id in the path', async () => {
    const fetchMock = vi.fn(async () => jsonResponse(download('failed')));
    vi.stubGlobal('fetch', fetchMock);

    await cancelDownload('http://server', 'a/b');

    expect(fetchMock).toHaveBeenCalledWith('http://server/api/downloads/a%2Fb', { method: 'DELETE' });
  });

  it('should list connected clients', async () => {
    const body = {
      count: 1,
      clients: [
        {
          client_id: 'agent-1',
          liveness: 'connected',
          connected_at: '2024-05-01T10:00:00.000Z',
          last_seen: '2024-05-01T10:00:30.000Z',
        },
      ],
    };
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(body)));

    expect(await listClients('http://server')).toEqual(body);
  });

  it('should poll until the download is terminal', async () => {
    const states = [download('dispatched'), download('in_progress', 5), download('completed', 10)];
    const fetchMock = vi.fn(async () => jsonResponse(states.shift()));
    vi.stubGlobal('fetch', fetchMock);
    const seen: DownloadStatus[] = [];

    const final = await waitForDownload('http://server', 'd-1', 1, (update) => seen.push(update.status));

    expect(final.status).toBe('completed');
    expect(final.bytes_received).toBe(10);
    expect(seen).toEqual(['dispatched', 'in_progress', 'completed']);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});
