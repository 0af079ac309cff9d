/**
 * Request/response types carried between requesters, the admission controller and the worker.
 */

import type { CompletionSender } from './completion.ts';
import type { TempStorage } from '../pipeline/temp-storage.ts';

/** Probe result of a source file. All zero when the file could not be probed. */
export interface ProbeMetadata {
  durationSeconds: number;
  bitrateKbps: number;
  width: number;
  height: number;
}

export const UNKNOWN_METADATA: Readonly<ProbeMetadata> = Object.freeze({
  durationSeconds: 0,
  bitrateKbps: 0,
  width: 0,
  height: 0,
});

export interface TaskOutput {
  /** Directory holding the artifacts. Whoever holds the output releases it. */
  storage: TempStorage;
  videoPath: string;
  thumbnailPath: string | null;
  /** Metadata of the original (pre-transcode) file. */
  metadata: ProbeMetadata;
  /** Target bitrate in kbps when the video had to be re-encoded below its original bitrate. */
  reducedBitrate: number | null;
}

export type TaskResult = { ok: true; output: TaskOutput } | { ok: false; reason: string };

export interface Task {
  url: string;
  enableFallback: boolean;
  completion: CompletionSender<TaskResult>;
}
