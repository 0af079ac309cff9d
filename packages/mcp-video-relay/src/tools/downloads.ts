/**
 * Download link tools: list_download_links, close_download_link
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DownloadManager } from '../download/download-manager.ts';
import { CloseDownloadLinkSchema, ListDownloadLinksSchema } from '../schemas/download.schema.ts';
import { errorResult, jsonResult } from './helpers.ts';

export function registerDownloadTools(server: McpServer, downloadManager: DownloadManager): void {
  server.registerTool(
    'list_download_links',
    {
      description:
        'List download links handed out for finished videos. By default shows only active links; ' +
        'use this to find links that should be closed.',
      inputSchema: ListDownloadLinksSchema.shape,
    },
    async (args) => {
      const links = downloadManager.listSessions(args.active_only);
      return jsonResult({ links, count: links.length });
    },
  );

  server.registerTool(
    'close_download_link',
    {
      description: 'Revoke an active download link. Its files are removed once no link of the same video is active.',
      inputSchema: CloseDownloadLinkSchema.shape,
    },
    async (args) => {
      try {
        return jsonResult({ status: await downloadManager.closeSession(args.token) });
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
