/**
 * User-facing texts for tool responses.
 */

import type { TaskOutput } from '../queue/task.ts';
import type { UrlsFound } from './url-info.ts';

export function formatAllowlist(allowlist: readonly string[]): string {
  return allowlist.length === 0 ? 'none' : allowlist.map((s) => `\`${s}\``).join(', ');
}

export function acceptMessage(position: number): string {
  return position === 0
    ? 'Request accepted. The queue is empty, downloading now.'
    : `Request accepted. Your position in the queue: ${position}.`;
}

export type Admission = { ok: true; url: string } | { ok: false; message: string };

/**
 * Decides whether a message can be turned into a download.
 * Fallback mode accepts a single URL even when it is not allowlisted.
 */
export function admitRequest(
  found: UrlsFound,
  fallback: boolean,
  allowlist: readonly string[],
  maintainer: string | null,
): Admission {
  let message: string;
  if (found.kind === 'none') {
    message = 'No URLs found.';
  } else if (found.kind === 'multiple') {
    message = 'Downloading more than one video at a time is unsupported.';
  } else if (!found.supported && !fallback) {
    message = `URL is unsupported.\n\nSupported websites: ${formatAllowlist(allowlist)}.`;
  } else {
    return { ok: true, url: found.url };
  }

  return {
    ok: false,
    message: maintainer ? `${message}\n\nFor more information, please contact ${maintainer}.` : message,
  };
}

/** Warning shown next to a video whose bitrate had to be reduced, or null. */
export function reductionWarning(output: Pick<TaskOutput, 'metadata' | 'reducedBitrate'>): string | null {
  if (output.reducedBitrate === null) return null;
  const original = output.metadata.bitrateKbps;
  const reduced = output.reducedBitrate;
  const percentage = original > 0 ? (1 - reduced / original) * 100 : 0;
  return (
    `Warning: the bitrate of the video has been reduced from ${original} kbps to ${reduced} kbps ` +
    `(${percentage.toFixed(1)}% reduction) to meet the upload size limit.`
  );
}

export function failureMessage(reason: string): string {
  return `Failed to download video (processing error: ${reason}).`;
}
