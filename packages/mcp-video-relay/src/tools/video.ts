/**
 * Video tool registration for MCP server
 *
 * download_video, get_queue_status, list_supported_sites
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { RelayConfig } from '../config.ts';
import type { DownloadManager } from '../download/download-manager.ts';
import { createCompletion } from '../queue/completion.ts';
import type { TaskManager } from '../queue/task-manager.ts';
import type { TaskResult } from '../queue/task.ts';
import { logger } from '../utils/logger.ts';
import { acceptMessage, admitRequest, failureMessage, reductionWarning } from '../utils/response-format.ts';
import { classifyUrls } from '../utils/url-info.ts';
import { DownloadVideoSchema, GetQueueStatusSchema, ListSupportedSitesSchema } from '../schemas/video.schema.ts';
import { awaitCompletion, errorResult, jsonResult } from './helpers.ts';

export interface VideoToolDeps {
  taskManager: TaskManager;
  downloadManager: DownloadManager;
  config: Pick<RelayConfig, 'allowlist' | 'maintainer'>;
}

export function registerVideoTools(server: McpServer, deps: VideoToolDeps): void {
  const { taskManager, downloadManager, config } = deps;

  server.registerTool(
    'download_video',
    {
      description:
        'Download the video linked in a chat message and return a temporary download link. ' +
        'Requests are processed one at a time; the call returns when the video is ready or failed. ' +
        'Videos are re-encoded to fit the upload size limit. If the result says the quality ' +
        'degradation is too severe or the site is unsupported, the user may retry with fallback: true.',
      inputSchema: DownloadVideoSchema.shape,
    },
    async (args, extra) => {
      try {
        const admission = admitRequest(
          classifyUrls(args.message, config.allowlist),
          args.fallback,
          config.allowlist,
          config.maintainer,
        );
        if (!admission.ok) {
          return errorResult(admission.message);
        }

        const url = admission.url;
        const reservation = taskManager.reserve();
        const { position } = reservation;
        try {
          await extra.sendNotification({
            method: 'notifications/message',
            params: { level: 'info', logger: 'download_video', data: acceptMessage(position) },
          });
        } catch (error) {
          taskManager.cancelReservation(reservation);
          throw error;
        }

        const { sender, receiver } = createCompletion<TaskResult>();
        taskManager.enqueue({ url, enableFallback: args.fallback, completion: sender }, reservation);
        logger.info({ url, position, fallback: args.fallback }, 'Request accepted');

        const result = await awaitCompletion(receiver, extra.signal);
        if (!result.ok) {
          return errorResult(failureMessage(result.reason));
        }

        const { output } = result;
        const published = await downloadManager.publish(output);
        return jsonResult({
          status: 'finished',
          queue_position: position,
          download_url: published.video.download_url,
          thumbnail_url: published.thumbnail?.download_url ?? null,
          expires_at: published.video.expires_at,
          file_size: published.video.file_size,
          duration: output.metadata.durationSeconds,
          width: output.metadata.width,
          height: output.metadata.height,
          original_bitrate_kbps: output.metadata.bitrateKbps,
          reduced_bitrate_kbps: output.reducedBitrate,
          warning: reductionWarning(output),
        });
      } catch (error) {
        logger.error(
          { tool: 'download_video', error: error instanceof Error ? error.message : String(error) },
          'Tool execution failed',
        );
        return errorResult(error);
      }
    },
  );

  server.registerTool(
    'get_queue_status',
    {
      description: 'Number of active download tasks (queued, being accepted, or in progress).',
      inputSchema: GetQueueStatusSchema.shape,
    },
    async () => {
      return jsonResult({
        active_tasks: taskManager.queueSize(),
        worker_state: taskManager.workerState,
      });
    },
  );

  server.registerTool(
    'list_supported_sites',
    {
      description: 'List the websites videos can be downloaded from without fallback mode.',
      inputSchema: ListSupportedSitesSchema.shape,
    },
    async () => {
      return jsonResult({ sites: config.allowlist, count: config.allowlist.length });
    },
  );
}
