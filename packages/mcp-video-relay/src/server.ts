#!/usr/bin/env -S npx tsx

/**
 * MCP Video Relay Server
 *
 * Downloads videos linked in chat messages and hands them back as temporary download links:
 * - One request processed at a time, with accurate queue positions
 * - Re-encoding to fit the upload size limit, within a quality threshold unless fallback is asked for
 * - Streamable HTTP transport for MCP clients, plus file download routes
 */

import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { loadConfig, SERVER_NAME, SERVER_VERSION, type RelayConfig } from './config.ts';
import { MCP_INSTRUCTIONS } from './instructions.ts';
import { DownloadManager } from './download/download-manager.ts';
import { setupDownloadRoutes } from './download/download-routes.ts';
import { FfmpegThumbnailExtractor, FfmpegTranscoder, FfprobeProber } from './pipeline/ffmpeg.ts';
import { runPipeline, type PipelineDeps } from './pipeline/pipeline.ts';
import { YtDlpExtractor } from './pipeline/ytdlp.ts';
import { TaskManager } from './queue/task-manager.ts';
import { registerDownloadTools } from './tools/downloads.ts';
import { registerVideoTools } from './tools/video.ts';
import { setupGracefulShutdown, setupMcpEndpoints } from './utils/http-server.ts';
import { logger } from './utils/logger.ts';

const SHUTDOWN_REASON = 'the server is shutting down';

export function createPipelineDeps(config: RelayConfig): PipelineDeps {
  return {
    extractor: new YtDlpExtractor(config.tools.ytdlp),
    prober: new FfprobeProber(config.tools.ffprobe),
    transcoder: new FfmpegTranscoder(config.limits.uploadLimitMb, config.tools.ffmpeg),
    thumbnails: new FfmpegThumbnailExtractor(config.tools.ffmpeg),
    limits: config.limits,
    tempRoot: config.tempRoot,
  };
}

export interface RelayServices {
  config: RelayConfig;
  taskManager: TaskManager;
  downloadManager: DownloadManager;
  transports: Map<string, StreamableHTTPServerTransport>;
}

function createMcpServer(services: RelayServices): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: { tools: {}, logging: {} },
      instructions: MCP_INSTRUCTIONS,
    },
  );

  registerVideoTools(server, {
    taskManager: services.taskManager,
    downloadManager: services.downloadManager,
    config: services.config,
  });
  registerDownloadTools(server, services.downloadManager);

  return server;
}

function createSession(services: RelayServices): { server: McpServer; transport: StreamableHTTPServerTransport } {
  const { transports } = services;
  const server = createMcpServer(services);
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    enableJsonResponse: true,
    onsessioninitialized: (sessionId: string) => {
      logger.info({ sessionId, totalSessions: transports.size + 1 }, 'Session initialized');
      transports.set(sessionId, transport);
    },
  });

  server.server.onclose = () => {
    const sid = transport.sessionId;
    if (sid && transports.has(sid)) {
      logger.info({ sessionId: sid, totalSessions: transports.size - 1 }, 'Session closed');
      transports.delete(sid);
    }
  };

  return { server, transport };
}

function createApp(services: RelayServices): express.Application {
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.disable('x-powered-by');

  setupDownloadRoutes(app, services.downloadManager);

  setupMcpEndpoints(app, {
    serverName: SERVER_NAME,
    version: SERVER_VERSION,
    transports: services.transports,
    createServer: () => createSession(services),
    health: () => ({
      activeTasks: services.taskManager.queueSize(),
      workerState: services.taskManager.workerState,
    }),
    logger,
  });

  return app;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const pipeline = createPipelineDeps(config);

  const services: RelayServices = {
    config,
    taskManager: new TaskManager((task) => runPipeline(task, pipeline)),
    downloadManager: new DownloadManager({
      baseUrl: config.baseUrl,
      defaultSessionTimeoutMin: config.downloadSessionTimeoutMin,
    }),
    transports: new Map(),
  };

  services.taskManager.start();

  const app = createApp(services);
  const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info(
      { port: config.port, server: SERVER_NAME, version: SERVER_VERSION, allowlist: config.allowlist, limits: config.limits },
      'MCP Video Relay Server started',
    );
  });

  setupGracefulShutdown(server, services.transports, logger, async () => {
    await services.taskManager.stop();
    services.taskManager.drain(SHUTDOWN_REASON);
    await services.downloadManager.dispose();
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start server');
    process.exit(1);
  });
}

export { createApp, createMcpServer };
