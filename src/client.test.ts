import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { OpenWebUIClient } from './client.js';
import { ConfigurationError } from './errors.js';
import { fetchCall, mockJson } from './test/fetch.js';

describe('OpenWebUIClient', () => {
  let dir: string;

  beforeEach(async () => {
    vi.stubGlobal('fetch', vi.fn());
    dir = await mkdtemp(join(tmpdir(), 'owui-client-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it('requires a base URL and API key', () => {
    expect(() => new OpenWebUIClient({ baseUrl: 'http://owui.test', apiKey: '' })).toThrow(
      new ConfigurationError('Client must be configured with baseUrl and apiKey.')
    );
  });

  it('shares one transport across the API groups', async () => {
    const client = new OpenWebUIClient({ baseUrl: 'http://owui.test/', apiKey: 'test-secret' });
    mockJson(200, []);
    mockJson(200, []);

    await client.folders.list();
    await client.knowledge.listAll();

    expect(client.baseUrl).toBe('http://owui.test');
    expect(fetchCall(0).url).toBe('http://owui.test/api/v1/folders/');
    expect(fetchCall(1).url).toBe('http://owui.test/api/v1/knowledge/list');
  });

  describe('fromConfig', () => {
    it('uses explicit settings without loading any configuration', () => {
      const client = OpenWebUIClient.fromConfig(
        { baseUrl: 'http://explicit.test', apiKey: 'test-secret' },
        { env: {}, cwd: dir, homeDir: dir }
      );

      expect(client.baseUrl).toBe('http://explicit.test');
    });

    it('fills missing settings from the configuration', async () => {
      const client = OpenWebUIClient.fromConfig(
        { baseUrl: 'http://explicit.test' },
        { env: { OPENWEBUI_URL: 'http://env.test', OPENWEBUI_API_KEY: 'test-secret' }, cwd: dir, homeDir: dir }
      );
      mockJson(200, []);

      await client.chats.list();

      expect(client.baseUrl).toBe('http://explicit.test');
      expect(fetchCall(0).headers.get('authorization')).toBe('Bearer test-secret');
    });

    it('wraps configuration failures', () => {
      expect(() => OpenWebUIClient.fromConfig({}, { env: {}, cwd: dir, homeDir: dir })).toThrow(
        /^Configuration failed: Configuration error: Open WebUI server URL is not configured\./
      );
    });
  });
});
