/**
 * Contracts of the external tools the pipeline drives. Default implementations live in
 * ytdlp.ts and ffmpeg.ts; tests substitute in-process fakes.
 */

import type { ProbeMetadata } from '../queue/task.ts';

export interface Extractor {
  /**
   * Downloads `url` into `outputDir` as exactly one file, refusing sources above `maxSizeMb`.
   * @throws ExtractionError (with `oversized` set when the cap was the cause)
   */
  extract(url: string, outputDir: string, maxSizeMb: number): Promise<void>;
}

export interface Prober {
  /** Duration, bitrate and dimensions of the first video stream, or null when there is none. */
  probe(path: string): Promise<ProbeMetadata | null>;
}

export interface Transcoder {
  /**
   * Writes a broadly playable mp4 to `outputPath`. Without a target bitrate the encoder
   * keeps its default quality.
   * @throws TranscodeError
   */
  transcode(inputPath: string, outputPath: string, targetBitrateKbps: number | null): Promise<void>;
}

export interface ThumbnailExtractor {
  /** Path of a single-frame image taken from the video, or null. */
  extract(videoPath: string): Promise<string | null>;
}

export interface PipelineCollaborators {
  extractor: Extractor;
  prober: Prober;
  transcoder: Transcoder;
  thumbnails: ThumbnailExtractor;
}
