/**
 * Zod schemas for video tools
 */

import { z } from 'zod';

export const DownloadVideoSchema = z.object({
  message: z
    .string()
    .min(1)
    .describe('Chat message containing exactly one video URL (e.g. "https://www.youtube.com/watch?v=...")'),
  fallback: z
    .boolean()
    .default(false)
    .describe(
      'Fallback mode: raises the source size limit, accepts sites outside the allowlist and allows any bitrate reduction (default: false)',
    ),
});

export const GetQueueStatusSchema = z.object({});

export const ListSupportedSitesSchema = z.object({});
