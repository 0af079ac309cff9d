/** Base error for mcp-video-relay; subclasses use fixed codes. */
export class VideoRelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly isError: boolean = true,
  ) {
    super(message);
    this.name = 'VideoRelayError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The extractor failed, refused an oversized source, or left the wrong number of files. */
export class ExtractionError extends VideoRelayError {
  constructor(
    message: string,
    public readonly oversized: boolean = false,
  ) {
    super(message, 'EXTRACTION_ERROR');
    this.name = 'ExtractionError';
  }
}

export class SizeLimitError extends VideoRelayError {
  constructor(public readonly limitMb: number) {
    super(`base file size exceeded ${limitMb} MB`, 'SIZE_LIMIT');
    this.name = 'SizeLimitError';
  }
}

export class QualityDegradationError extends VideoRelayError {
  constructor(
    public readonly maxBitrateKbps: number,
    public readonly originalBitrateKbps: number,
  ) {
    super(
      `quality degradation too severe: upload-adjusted bitrate ${maxBitrateKbps} kbps is below 85% of the original ${originalBitrateKbps} kbps; retry with fallback enabled`,
      'QUALITY_DEGRADATION',
    );
    this.name = 'QualityDegradationError';
  }
}

export class TranscodeError extends VideoRelayError {
  constructor(
    message: string,
    public readonly url?: string,
    public readonly bitrateKbps?: number | null,
  ) {
    super(message, 'TRANSCODE_ERROR');
    this.name = 'TranscodeError';
  }
}

/** The other end of a completion channel is gone. Logged, never shown to users. */
export class ChannelClosedError extends VideoRelayError {
  constructor(message = 'channel closed') {
    super(message, 'CHANNEL_CLOSED');
    this.name = 'ChannelClosedError';
  }
}

export class ConfigError extends VideoRelayError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** Reason string for a failed task: project errors verbatim, anything else marked internal. */
export function failureReason(error: unknown): string {
  if (error instanceof VideoRelayError) return error.message;
  return `internal error: ${error instanceof Error ? error.message : String(error)}`;
}
