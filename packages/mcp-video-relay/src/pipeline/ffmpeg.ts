/**
 * ffmpeg/ffprobe backed prober, transcoder and thumbnail extractor.
 */

import { rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { ProbeMetadata } from '../queue/task.ts';
import { TranscodeError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import { lastLine, runProcess } from '../utils/process.ts';
import type { Prober, ThumbnailExtractor, Transcoder } from './collaborators.ts';

const AUDIO_BITRATE = '128k';
const THUMBNAIL_FILENAME = 'thumbnail.jpg';

const numeric = z.union([z.string(), z.number()]).optional();

const FfprobeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
      }),
    )
    .default([]),
  format: z
    .object({
      duration: numeric,
      bit_rate: numeric,
    })
    .default({}),
});

function toWholeNumber(value: string | number | undefined): number {
  const n = typeof value === 'number' ? value : Number.parseFloat(value ?? '');
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

/**
 * Maps `ffprobe -print_format json -show_format -show_streams` output to ProbeMetadata.
 * Returns null when there is no video stream or the output is not ffprobe JSON.
 */
export function parseProbeOutput(raw: unknown): ProbeMetadata | null {
  const parsed = FfprobeOutputSchema.safeParse(raw);
  if (!parsed.success) return null;

  const video = parsed.data.streams.find((s) => s.codec_type === 'video');
  if (!video) return null;

  return {
    durationSeconds: toWholeNumber(parsed.data.format.duration),
    bitrateKbps: Math.floor(toWholeNumber(parsed.data.format.bit_rate) / 1000),
    width: toWholeNumber(video.width),
    height: toWholeNumber(video.height),
  };
}

export class FfprobeProber implements Prober {
  constructor(private readonly binary: string = 'ffprobe') {}

  async probe(path: string): Promise<ProbeMetadata | null> {
    const result = await runProcess(this.binary, [
      '-v',
      'error',
      '-print_format',
      'json',
      '-show_format',
      '-show_streams',
      path,
    ]);
    if (result.code !== 0) {
      logger.warn({ path, detail: lastLine(result.stderr) }, 'ffprobe failed');
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch (error) {
      logger.warn({ path, error: error instanceof Error ? error.message : String(error) }, 'ffprobe output is not JSON');
      return null;
    }
    return parseProbeOutput(json);
  }
}

/** ffmpeg arguments for an h.264/yuv420p, fast-start mp4 capped at `maxSizeMb`. */
export function buildTranscodeArgs(
  inputPath: string,
  outputPath: string,
  targetBitrateKbps: number | null,
  maxSizeMb: number,
): string[] {
  const args = [
    '-y',
    '-i',
    inputPath,
    '-c:v',
    'libx264',
    '-movflags',
    '+faststart',
    '-pix_fmt',
    'yuv420p',
    '-b:a',
    AUDIO_BITRATE,
    '-fs',
    `${maxSizeMb}M`,
    // even dimensions, required by yuv420p
    '-vf',
    'crop=trunc(iw/2)*2:trunc(ih/2)*2',
  ];

  if (targetBitrateKbps !== null) {
    args.push('-b:v', `${targetBitrateKbps}k`);
  }

  args.push(outputPath);
  return args;
}

export class FfmpegTranscoder implements Transcoder {
  constructor(
    private readonly maxSizeMb: number,
    private readonly binary: string = 'ffmpeg',
  ) {}

  async transcode(inputPath: string, outputPath: string, targetBitrateKbps: number | null): Promise<void> {
    const args = buildTranscodeArgs(inputPath, outputPath, targetBitrateKbps, this.maxSizeMb);
    logger.debug({ inputPath, outputPath, targetBitrateKbps }, 'Starting transcode');

    const result = await runProcess(this.binary, args);
    if (result.code !== 0) {
      await rm(outputPath, { force: true });
      const detail = lastLine(result.stderr) || `exit code ${result.code ?? result.signal}`;
      throw new TranscodeError(`conversion failed: ${detail}`, undefined, targetBitrateKbps);
    }
  }
}

export class FfmpegThumbnailExtractor implements ThumbnailExtractor {
  constructor(private readonly binary: string = 'ffmpeg') {}

  async extract(videoPath: string): Promise<string | null> {
    const thumbnailPath = join(dirname(videoPath), THUMBNAIL_FILENAME);
    const result = await runProcess(this.binary, ['-y', '-i', videoPath, '-vframes', '1', '-q:v', '3', thumbnailPath]);

    if (result.code !== 0) {
      logger.warn({ videoPath, detail: lastLine(result.stderr) }, 'Thumbnail extraction failed');
      return null;
    }
    return thumbnailPath;
  }
}
