import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { Server } from 'node:http';
import { rm } from 'node:fs/promises';
import type { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { loadConfig } from '../src/config.ts';
import { DownloadManager } from '../src/download/download-manager.ts';
import { TaskManager } from '../src/queue/task-manager.ts';
import { createApp } from '../src/server.ts';
import { makeOutput, makeTempRoot } from './fakes.ts';

describe('HTTP routes', () => {
  let root: string;
  let server: Server;
  let baseUrl: string;
  const downloadManager = new DownloadManager({ baseUrl: 'http://relay.test' });

  before(async () => {
    root = await makeTempRoot();
    const services = {
      config: loadConfig({ ALLOWLIST: 'youtube.com' }),
      taskManager: new TaskManager(async () => makeOutput(root)),
      downloadManager,
      transports: new Map<string, StreamableHTTPServerTransport>(),
    };
    server = await new Promise<Server>((resolve) => {
      const listening = createApp(services).listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    assert.ok(address !== null && typeof address === 'object');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await downloadManager.dispose();
    await rm(root, { recursive: true, force: true });
  });

  it('reports health with queue figures', async () => {
    const response = await fetch(`${baseUrl}/health`);

    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      status: 'ok',
      server: 'mcp-video-relay',
      version: '1.0.0',
      activeSessions: 0,
      activeTasks: 0,
      workerState: 'idle',
    });
  });

  it('serves a download once and answers 410 afterwards', async () => {
    const output = await makeOutput(root);
    const { video } = await downloadManager.publish(output);

    const info = await fetch(`${baseUrl}/download/${video.token}/info`);
    assert.deepEqual(await info.json(), {
      status: 'active',
      kind: 'video',
      filename: 'out.mp4',
      file_size: 5,
      mime_type: 'video/mp4',
      expires_at: video.expires_at,
    });

    const first = await fetch(`${baseUrl}/download/${video.token}`);
    assert.equal(first.status, 200);
    assert.equal(first.headers.get('content-type'), 'video/mp4');
    assert.equal(first.headers.get('content-disposition'), 'attachment; filename="out.mp4"');
    assert.equal(await first.text(), 'video');

    const second = await fetch(`${baseUrl}/download/${video.token}`);
    assert.equal(second.status, 410);
    assert.deepEqual(await second.json(), {
      error: 'This file has already been downloaded. The link is now closed.',
      status: 'downloaded',
    });
    assert.equal(output.storage.isReleased, true);
  });

  it('answers 404 for unknown tokens', async () => {
    const response = await fetch(`${baseUrl}/download/unknown-token`);

    assert.equal(response.status, 404);
    assert.deepEqual(await response.json(), { error: 'This download link is invalid or has been removed.' });
  });

  it('refuses MCP requests without a session that are not initialize', async () => {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json, text/event-stream' },
      body: JSON.stringify({ jsonrpc: '2.0', id: 7, method: 'tools/list' }),
    });

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), {
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Bad Request: No session ID provided' },
      id: 7,
    });
  });
});
