/**
 * Bitrate decision: how far a video must be re-encoded to fit the upload limit.
 */

import { QualityDegradationError } from '../utils/errors.ts';

/** Reserved for the audio track (the transcoder encodes audio at 128k). */
export const AUDIO_RESERVE_KBPS = 128;
/** Container/muxing overhead margin. */
export const CONTAINER_OVERHEAD_FACTOR = 0.97;
/** Without fallback, the re-encoded bitrate may not drop below this share of the original. */
export const MIN_QUALITY_RATIO = 0.85;
/** megabytes → kilobits: 8 bits per byte × 1000 kB per MB. */
const KILOBITS_PER_MEGABYTE = 8000;

export interface BitrateInput {
  durationSeconds: number;
  originalBitrateKbps: number;
  uploadLimitMb: number;
  enableFallback: boolean;
}

export interface BitrateDecision {
  /** Highest video bitrate that fits the upload limit; null when the duration is unknown. */
  maxBitrateKbps: number | null;
  /** Bitrate passed to the transcoder; null means "encode without a bitrate constraint". */
  targetBitrateKbps: number | null;
  reduced: boolean;
}

/** floor(((limit × 8000 / duration) − 128) × 0.97), never below zero. */
export function maxBitrateFor(uploadLimitMb: number, durationSeconds: number): number {
  const capacity = (uploadLimitMb * KILOBITS_PER_MEGABYTE) / durationSeconds;
  const withAudioReserved = capacity - AUDIO_RESERVE_KBPS;
  return Math.max(0, Math.floor(withAudioReserved * CONTAINER_OVERHEAD_FACTOR));
}

/**
 * @throws QualityDegradationError when the reduction exceeds 15% of the original bitrate
 *   and fallback is off. An original bitrate of 0 (unknown) never triggers this.
 */
export function decideBitrate(input: BitrateInput): BitrateDecision {
  if (input.durationSeconds <= 0) {
    return { maxBitrateKbps: null, targetBitrateKbps: null, reduced: false };
  }

  const maxBitrateKbps = maxBitrateFor(input.uploadLimitMb, input.durationSeconds);
  const original = input.originalBitrateKbps;

  if (original > 0 && !input.enableFallback) {
    const cutoff = Math.floor(original * MIN_QUALITY_RATIO);
    if (maxBitrateKbps < cutoff) {
      throw new QualityDegradationError(maxBitrateKbps, original);
    }
  }

  // A cap of 0 leaves no room for video at all; -fs still bounds the file.
  if (maxBitrateKbps === 0 || original < maxBitrateKbps) {
    return { maxBitrateKbps, targetBitrateKbps: null, reduced: false };
  }
  return { maxBitrateKbps, targetBitrateKbps: maxBitrateKbps, reduced: true };
}
