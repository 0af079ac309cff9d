/**
 * HTTP server utilities: MCP Streamable HTTP endpoints and graceful shutdown.
 */

import express, { type Request, type Response } from 'express';
import type { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

interface LoggerLike {
  info: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
}

/**
 * Extracts MCP session ID from HTTP request headers
 */
export function getSessionId(headers: Request['headers']): string | undefined {
  const header = headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

/**
 * Sends a JSON-RPC error response
 */
export function sendErrorResponse(
  res: Response,
  status: number,
  code: number,
  message: string,
  id: unknown = null,
): void {
  if (res.headersSent) return;
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id,
  });
}

function requestIdOf(body: unknown): unknown {
  return typeof body === 'object' && body !== null && 'id' in body ? body.id : null;
}

function isInitializeRequest(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'method' in body && body.method === 'initialize';
}

/**
 * Configuration for creating HTTP server endpoints
 */
export interface HttpServerConfig {
  serverName: string;
  version: string;
  transports: Map<string, StreamableHTTPServerTransport>;
  createServer: () => {
    server: { connect: (transport: StreamableHTTPServerTransport) => Promise<void> };
    transport: StreamableHTTPServerTransport;
  };
  /** Extra fields merged into the /health response. */
  health?: () => Record<string, unknown>;
  logger?: LoggerLike;
}

/**
 * Creates standard Express endpoints for MCP HTTP server
 */
export function setupMcpEndpoints(app: express.Application, config: HttpServerConfig): void {
  const { serverName, version, transports, createServer, health, logger } = config;

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      server: serverName,
      version,
      activeSessions: transports.size,
      ...health?.(),
    });
  });

  // SSE stream endpoint (GET /mcp)
  app.get('/mcp', async (req: Request, res: Response) => {
    const sessionId = getSessionId(req.headers);
    if (!sessionId) {
      sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided');
      return;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      sendErrorResponse(res, 404, -32000, 'Session not found');
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      logger?.error(
        { error: error instanceof Error ? error.message : String(error), sessionId },
        'Error handling SSE stream request',
      );
      sendErrorResponse(res, 500, -32603, 'Internal server error');
    }
  });

  // Session termination endpoint (DELETE /mcp)
  app.delete('/mcp', async (req: Request, res: Response) => {
    const sessionId = getSessionId(req.headers);
    if (!sessionId) {
      sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided');
      return;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      sendErrorResponse(res, 404, -32000, 'Session not found');
      return;
    }

    try {
      await transport.handleRequest(req, res, req.body);
      transports.delete(sessionId);
      logger?.info({ sessionId, totalSessions: transports.size }, 'Session deleted');
    } catch (error) {
      logger?.error(
        { error: error instanceof Error ? error.message : String(error), sessionId },
        'Error handling session termination',
      );
      sendErrorResponse(res, 500, -32603, 'Error handling session termination');
    }
  });

  // Main MCP endpoint (POST /mcp)
  app.post('/mcp', async (req: Request, res: Response) => {
    const requestId = requestIdOf(req.body);
    try {
      const sessionId = getSessionId(req.headers);

      if (sessionId) {
        const transport = transports.get(sessionId);
        if (transport) {
          await transport.handleRequest(req, res, req.body);
          return;
        }
        sendErrorResponse(res, 404, -32000, 'Session not found', requestId);
        return;
      }

      // No session ID - only initialize requests may create a session
      if (!isInitializeRequest(req.body)) {
        sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided', requestId);
        return;
      }

      const { server, transport } = createServer();
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger?.error({ error: error instanceof Error ? error.message : String(error) }, 'Error handling MCP request');
      sendErrorResponse(res, 500, -32603, 'Internal server error', requestId);
    }
  });
}

/**
 * Sets up graceful shutdown handlers. `beforeExit` runs after transports are closed and the
 * HTTP server stopped accepting connections.
 */
export function setupGracefulShutdown(
  server: ReturnType<express.Application['listen']>,
  transports: Map<string, StreamableHTTPServerTransport>,
  logger?: LoggerLike,
  beforeExit?: () => Promise<void>,
): void {
  let shuttingDown = false;

  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger?.info({}, 'Shutting down...');

    for (const [sessionId, transport] of transports.entries()) {
      try {
        await transport.close();
      } catch (error) {
        logger?.error(
          { error: error instanceof Error ? error.message : String(error), sessionId },
          'Error closing transport',
        );
      }
    }
    transports.clear();

    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    try {
      await beforeExit?.();
    } catch (error) {
      logger?.error({ error: error instanceof Error ? error.message : String(error) }, 'Error during shutdown');
    }
    await closed;
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger?.error({ error: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}
