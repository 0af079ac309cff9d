/**
 * Server and runtime configuration.
 * Environment variables are read once at startup; invalid values raise ConfigError and the server exits(1).
 */

import { tmpdir } from 'node:os';
import { z } from 'zod';
import { ConfigError } from './utils/errors.ts';

export const SERVER_NAME = 'mcp-video-relay';
export const SERVER_VERSION = '1.0.0';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: positiveInt(3020),
  MCP_VIDEO_RELAY_BASE_URL: z.string().url().optional(),
  ALLOWLIST: z.string().default(''),
  MAINTAINER: z.string().trim().optional(),
  MAX_FILESIZE_MB: positiveInt(200),
  FALLBACK_FILESIZE_RATIO: positiveInt(5),
  UPLOAD_LIMIT_MB: positiveInt(50),
  TEMP_ROOT: z.string().min(1).optional(),
  YTDLP_PATH: z.string().min(1).default('yt-dlp'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
  DOWNLOAD_SESSION_TIMEOUT_MIN: positiveInt(60),
});

export interface FilesizeLimits {
  /** Fetch cap for regular requests, in decimal megabytes. */
  maxFilesizeMb: number;
  /** Fetch cap when the requester opted into fallback mode. */
  fallbackFilesizeMb: number;
  /** Ceiling of the produced artifact; drives the bitrate decision. */
  uploadLimitMb: number;
}

export interface ToolPaths {
  ytdlp: string;
  ffmpeg: string;
  ffprobe: string;
}

export interface RelayConfig {
  port: number;
  baseUrl: string;
  allowlist: string[];
  maintainer: string | null;
  limits: FilesizeLimits;
  tempRoot: string;
  tools: ToolPaths;
  downloadSessionTimeoutMin: number;
}

/** Splits `site1.com, site2.net,,site3.edu` into trimmed, non-empty entries. */
export function parseAllowlist(raw: string): string[] {
  return [...new Set(raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0))];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    baseUrl: (e.MCP_VIDEO_RELAY_BASE_URL ?? `http://localhost:${e.PORT}`).replace(/\/+$/, ''),
    allowlist: parseAllowlist(e.ALLOWLIST),
    maintainer: e.MAINTAINER ? `@${e.MAINTAINER.replace(/^@/, '')}` : null,
    limits: {
      maxFilesizeMb: e.MAX_FILESIZE_MB,
      fallbackFilesizeMb: e.MAX_FILESIZE_MB * e.FALLBACK_FILESIZE_RATIO,
      uploadLimitMb: e.UPLOAD_LIMIT_MB,
    },
    tempRoot: e.TEMP_ROOT ?? tmpdir(),
    tools: {
      ytdlp: e.YTDLP_PATH,
      ffmpeg: e.FFMPEG_PATH,
      ffprobe: e.FFPROBE_PATH,
    },
    downloadSessionTimeoutMin: e.DOWNLOAD_SESSION_TIMEOUT_MIN,
  };
}
