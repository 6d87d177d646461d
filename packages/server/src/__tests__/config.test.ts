import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import { loadConfig, validateServerConfig } from '../config.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8080);
    expect(config.host).toBe('0.0.0.0');
    expect(config.nodeEnv).toBe('development');
    expect(config.logLevel).toBe('info');
    expect(config.corsOrigin).toBe(true);
    expect(config.downloadDir).toBe(path.resolve('./downloads'));
    expect(config.chunkSize).toBe(1024 * 1024);
    expect(config.transferInactivityTimeoutMs).toBe(30000);
    expect(config.transferConcurrency).toBe('allow');
    expect(config.wsHeartbeatInterval).toBe(30000);
    expect(config.wsPingTimeout).toBe(10000);
    expect(config.wsMaxPayload).toBe(16 * 1024 * 1024);
  });

  it('should read environment variables', () => {
    const config = loadConfig({
      PORT: '9000',
      DOWNLOAD_DIR: '/srv/artifacts',
      CHUNK_SIZE: '65536',
      TRANSFER_INACTIVITY_TIMEOUT_MS: '5000',
      TRANSFER_CONCURRENCY: 'deny',
      CORS_ORIGIN: 'https://a.example,https://b.example',
    });

    expect(config.port).toBe(9000);
    expect(config.downloadDir).toBe(path.resolve('/srv/artifacts'));
    expect(config.chunkSize).toBe(65536);
    expect(config.transferInactivityTimeoutMs).toBe(5000);
    expect(config.transferConcurrency).toBe('deny');
    expect(config.corsOrigin).toEqual(['https://a.example', 'https://b.example']);
  });

  it('should fall back on unparseable values', () => {
    const config = loadConfig({ PORT: 'abc', TRANSFER_CONCURRENCY: 'sometimes' });

    expect(config.port).toBe(8080);
    expect(config.transferConcurrency).toBe('allow');
  });
});

describe('validateServerConfig', () => {
  it('should accept the defaults', () => {
    expect(validateServerConfig(loadConfig({}))).toEqual([]);
  });

  it('should report every problem', () => {
    const config = {
      ...loadConfig({}),
      port: 70000,
      chunkSize: 0,
      transferInactivityTimeoutMs: 0,
    };

    expect(validateServerConfig(config)).toEqual([
      'port must be between 0 and 65535',
      'chunkSize must be at least 1',
      'transferInactivityTimeoutMs must be positive',
    ]);
  });

  it('should require room in a frame for a base64 chunk', () => {
    const config = { ...loadConfig({}), chunkSize: 8 * 1024 * 1024, wsMaxPayload: 1024 * 1024 };

    expect(validateServerConfig(config)).toEqual(['wsMaxPayload is too small for the configured chunkSize']);
  });

  it('should cap the chunk size', () => {
    const config = { ...loadConfig({}), chunkSize: 9 * 1024 * 1024, wsMaxPayload: 64 * 1024 * 1024 };

    expect(validateServerConfig(config)).toEqual(['chunkSize must not exceed 8388608']);
  });
});
