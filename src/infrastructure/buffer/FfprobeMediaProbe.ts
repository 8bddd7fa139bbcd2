/**
 * Media probe backed by ffprobe
 * Reads container-level bitrate and size from ffprobe's JSON output
 */

import fs from 'fs';
import config from '../../config';
import { ILogger, IMediaProbe, IProcessLauncher, MediaProbe } from '../../domain/interfaces';
import { sleep } from '../../utils/poll';

const KILL_GRACE_MS = 1000;

export class FfprobeMediaProbe implements IMediaProbe {
  constructor(
    private readonly launcher: IProcessLauncher,
    private readonly logger: ILogger,
    private readonly binary: string = config.FFPROBE_BIN,
    private readonly timeoutMs: number = 10000
  ) { }

  async probe(mediaPath: string): Promise<MediaProbe | null> {
    let statSize: number | null = null;
    try {
      statSize = (await fs.promises.stat(mediaPath)).size;
    } catch {
      return null;
    }

    try {
      const output = await this.run(mediaPath);
      return parseFfprobeOutput(output, statSize);
    } catch (error) {
      this.logger.debug(`ffprobe unavailable for ${mediaPath}:`, error instanceof Error ? error.message : error);
      return { bitrateBytesPerSec: null, sizeBytes: statSize };
    }
  }

  private async run(mediaPath: string): Promise<string> {
    const ffprobe = this.launcher.spawn(this.binary, [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      mediaPath
    ], { captureOutput: true });

    const deadline = new AbortController();
    const exit = await Promise.race([
      ffprobe.exitPromise,
      sleep(this.timeoutMs, deadline.signal).then(() => null)
    ]).finally(() => deadline.abort());

    if (exit === null) {
      await ffprobe.terminate(KILL_GRACE_MS);
      throw new Error(`ffprobe timed out after ${this.timeoutMs}ms`);
    }
    if (exit.error) {
      throw exit.error;
    }
    if (exit.code !== 0) {
      throw new Error(`ffprobe failed with code ${exit.code ?? exit.signal ?? 'unknown'}: ${ffprobe.output().trim()}`);
    }
    return ffprobe.output();
  }
}

/**
 * Extracts bytes/sec bitrate and total size, preferring the declared bit_rate
 */
export function parseFfprobeOutput(json: string, fallbackSize: number | null): MediaProbe {
  // stderr shares the capture, keep only the JSON document
  const start = json.indexOf('{');
  const end = json.lastIndexOf('}');
  let parsed: unknown;
  try {
    parsed = JSON.parse(start >= 0 && end > start ? json.slice(start, end + 1) : json);
  } catch {
    return { bitrateBytesPerSec: null, sizeBytes: fallbackSize };
  }

  const format = isRecord(parsed) && isRecord(parsed.format) ? parsed.format : {};
  const size = toPositiveNumber(format.size) ?? fallbackSize;
  const bitsPerSecond = toPositiveNumber(format.bit_rate);
  const duration = toPositiveNumber(format.duration);

  let bitrate: number | null = null;
  if (bitsPerSecond !== null) {
    bitrate = bitsPerSecond / 8;
  } else if (duration !== null && size !== null) {
    bitrate = size / duration;
  }

  return { bitrateBytesPerSec: bitrate, sizeBytes: size };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// ffprobe reports numbers as strings
function toPositiveNumber(value: unknown): number | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}
