/**
 * Processing pipeline
 *
 * fetch → size re-check → probe → bitrate decision → transcode → thumbnail
 *
 * An unconstrained transcode that fails is retried once at the upload bitrate, when the
 * duration is known.
 *
 * Each stage runs after the previous one finished; the first failure aborts the rest and
 * removes the task's temp storage. On success the storage travels inside TaskOutput.
 */

import { randomUUID } from 'node:crypto';
import { readdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { FilesizeLimits } from '../config.ts';
import { UNKNOWN_METADATA, type ProbeMetadata, type TaskOutput } from '../queue/task.ts';
import { ExtractionError, SizeLimitError, TranscodeError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import { decideBitrate } from './bitrate.ts';
import type { PipelineCollaborators, Prober, ThumbnailExtractor } from './collaborators.ts';
import { TempStorage } from './temp-storage.ts';

const BYTES_PER_MEGABYTE = 1_000_000;

export interface PipelineDeps extends PipelineCollaborators {
  limits: FilesizeLimits;
  tempRoot: string;
}

export interface PipelineRequest {
  url: string;
  enableFallback: boolean;
}

/** Fetch cap for a request, in decimal megabytes. */
export function fetchCapMb(limits: FilesizeLimits, enableFallback: boolean): number {
  return enableFallback ? limits.fallbackFilesizeMb : limits.maxFilesizeMb;
}

export async function runPipeline(request: PipelineRequest, deps: PipelineDeps): Promise<TaskOutput> {
  const storage = await TempStorage.create(deps.tempRoot);
  try {
    return await runStages(request, deps, storage);
  } catch (error) {
    await storage.release();
    throw error;
  }
}

async function runStages(request: PipelineRequest, deps: PipelineDeps, storage: TempStorage): Promise<TaskOutput> {
  const { url, enableFallback } = request;
  const capMb = fetchCapMb(deps.limits, enableFallback);

  await deps.extractor.extract(url, storage.path, capMb);
  const sourcePath = await singleOutputFile(storage.path);

  const { size } = await stat(sourcePath);
  const megabytes = Math.floor(size / BYTES_PER_MEGABYTE);
  if (megabytes > capMb) {
    throw new SizeLimitError(capMb);
  }

  const metadata = await probeOrUnknown(deps.prober, sourcePath);

  const decision = decideBitrate({
    durationSeconds: metadata.durationSeconds,
    originalBitrateKbps: metadata.bitrateKbps,
    uploadLimitMb: deps.limits.uploadLimitMb,
    enableFallback,
  });

  const videoPath = join(storage.path, `${randomUUID()}.mp4`);
  logger.debug(
    { url, megabytes, metadata, maxBitrate: decision.maxBitrateKbps, target: decision.targetBitrateKbps },
    'Transcoding',
  );

  try {
    await deps.transcoder.transcode(sourcePath, videoPath, decision.targetBitrateKbps);
  } catch (error) {
    await rm(videoPath, { force: true });
    const retryBitrate = decision.targetBitrateKbps === null ? decision.maxBitrateKbps : null;
    if (retryBitrate === null || retryBitrate <= 0) {
      throw conversionError(url, decision.targetBitrateKbps, error);
    }

    logger.warn({ url, bitrate: retryBitrate, error: errorMessage(error) }, 'Transcode failed, retrying at the upload bitrate');
    try {
      await deps.transcoder.transcode(sourcePath, videoPath, retryBitrate);
    } catch (retryError) {
      await rm(videoPath, { force: true });
      throw conversionError(url, retryBitrate, retryError);
    }
  }

  const thumbnailPath = await thumbnailOrNull(deps.thumbnails, videoPath);

  return {
    storage,
    videoPath,
    thumbnailPath,
    metadata,
    reducedBitrate: decision.reduced ? decision.targetBitrateKbps : null,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function conversionError(url: string, bitrateKbps: number | null, cause: unknown): TranscodeError {
  return new TranscodeError(
    `failed to convert ${url} (bitrate: ${bitrateKbps ?? 'original'}): ${errorMessage(cause)}`,
    url,
    bitrateKbps,
  );
}

/** The extractor must leave exactly one file behind. */
async function singleOutputFile(dir: string): Promise<string> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    throw new ExtractionError(
      `could not read download directory: ${errorMessage(error)}`,
    );
  }
  if (entries.length !== 1) {
    throw new ExtractionError(`${entries.length} files found, expected 1`);
  }
  return join(dir, entries[0]);
}

async function probeOrUnknown(prober: Prober, path: string): Promise<ProbeMetadata> {
  try {
    const metadata = await prober.probe(path);
    if (metadata) return metadata;
    logger.warn({ path }, 'No video stream found, continuing without metadata');
  } catch (error) {
    logger.warn({ path, error: errorMessage(error) }, 'Probe failed');
  }
  return { ...UNKNOWN_METADATA };
}

async function thumbnailOrNull(thumbnails: ThumbnailExtractor, videoPath: string): Promise<string | null> {
  try {
    return await thumbnails.extract(videoPath);
  } catch (error) {
    logger.warn({ videoPath, error: errorMessage(error) }, 'No thumbnail');
    return null;
  }
}
