/**
 * Zod schemas for download link tools
 */

import { z } from 'zod';

export const ListDownloadLinksSchema = z.object({
  active_only: z.boolean().default(true).describe('Only show links that can still be downloaded (default: true)'),
});

export const CloseDownloadLinkSchema = z.object({
  token: z.string().min(1).describe('Token of the download link to revoke'),
});
