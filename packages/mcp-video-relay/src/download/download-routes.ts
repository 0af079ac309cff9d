/**
 * Download HTTP Routes
 *
 * - GET /download/:token       Streams the artifact to the browser
 * - GET /download/:token/info  Returns session metadata as JSON
 */

import type express from 'express';
import type { Request, Response } from 'express';
import { createReadStream, existsSync } from 'node:fs';
import { logger } from '../utils/logger.ts';
import type { DownloadManager, DownloadSessionStatus } from './download-manager.ts';

/**
 * Extracts a route param as a single string (Express 5 params may be string | string[]).
 */
function paramString(value: string | string[] | undefined): string {
  if (Array.isArray(value)) return value[0] ?? '';
  return value ?? '';
}

const GONE_MESSAGES: Record<Exclude<DownloadSessionStatus, 'active'>, string> = {
  expired: 'This download link has expired. Please request the video again.',
  downloaded: 'This file has already been downloaded. The link is now closed.',
  closed: 'This download link has been revoked.',
};

function logCompletionError(token: string) {
  return (error: unknown) => {
    logger.error({ token, error: error instanceof Error ? error.message : String(error) }, 'Failed to complete download session');
  };
}

export function setupDownloadRoutes(app: express.Application, downloadManager: DownloadManager): void {
  // ── GET /download/:token: stream the file ─────────────────────────────────
  app.get('/download/:token', (req: Request, res: Response) => {
    const token = paramString(req.params.token);
    const session = downloadManager.getSession(token);

    if (!session) {
      res.status(404).json({ error: 'This download link is invalid or has been removed.' });
      return;
    }

    if (session.status !== 'active') {
      res.status(410).json({ error: GONE_MESSAGES[session.status], status: session.status });
      return;
    }

    if (!existsSync(session.absolutePath)) {
      logger.error({ token, path: session.absolutePath }, 'Download file no longer exists');
      res.status(404).json({ error: 'The file is no longer available.' });
      return;
    }

    res.setHeader('Content-Type', session.mimeType);
    res.setHeader('Content-Disposition', `attachment; filename="${encodeURIComponent(session.filename)}"`);
    res.setHeader('Content-Length', session.fileSize);
    res.setHeader('Cache-Control', 'no-store');

    const fileStream = createReadStream(session.absolutePath);

    fileStream.on('error', (error) => {
      logger.error({ error, token, path: session.absolutePath }, 'Error streaming download file');
      if (!res.headersSent) {
        res.status(500).json({ error: 'An error occurred while streaming the file.' });
      } else {
        res.destroy(error);
      }
    });

    fileStream.on('end', () => {
      downloadManager.completeSession(token).catch(logCompletionError(token));
    });

    fileStream.pipe(res);
  });

  // ── GET /download/:token/info: session metadata as JSON ───────────────────
  app.get('/download/:token/info', (req: Request, res: Response) => {
    const token = paramString(req.params.token);
    const session = downloadManager.getSession(token);

    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    res.json({
      status: session.status,
      kind: session.kind,
      filename: session.filename,
      file_size: session.fileSize,
      mime_type: session.mimeType,
      expires_at: session.expiresAt.toISOString(),
    });
  });
}
