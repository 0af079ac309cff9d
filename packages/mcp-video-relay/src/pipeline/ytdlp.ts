/**
 * yt-dlp backed extractor.
 */

import { ExtractionError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import { lastLine, runProcess } from '../utils/process.ts';
import type { Extractor } from './collaborators.ts';

/** yt-dlp reports an oversized source on stdout and may still exit 0. */
const OVERSIZE_PATTERN = /larger than max-filesize/i;

export class YtDlpExtractor implements Extractor {
  constructor(private readonly binary: string = 'yt-dlp') {}

  async extract(url: string, outputDir: string, maxSizeMb: number): Promise<void> {
    const args = [
      '--no-playlist',
      '--max-filesize',
      `${maxSizeMb}M`,
      '--merge-output-format',
      'mp4',
      '--output',
      `${outputDir}/%(id)s.%(ext)s`,
      url,
    ];

    logger.debug({ url, outputDir, maxSizeMb }, 'Starting extractor');
    const result = await runProcess(this.binary, args);

    if (OVERSIZE_PATTERN.test(result.stdout) || OVERSIZE_PATTERN.test(result.stderr)) {
      throw new ExtractionError(`source file is larger than ${maxSizeMb} MB`, true);
    }

    if (result.code !== 0) {
      const detail = lastLine(result.stderr) || `exit code ${result.code ?? result.signal}`;
      logger.warn({ url, code: result.code, signal: result.signal, detail }, 'Extractor failed');
      throw new ExtractionError(`download failed: ${detail}`);
    }
  }
}
