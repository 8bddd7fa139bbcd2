/**
 * Estimates how many bytes must be on disk before playback can start safely
 */

import fs from 'fs';
import config from '../../config';
import { BufferTarget } from '../../domain/entities';
import { IMediaProbe, MediaProbe } from '../../domain/interfaces';

const MB = 1024 * 1024;

export interface BufferPolicy {
  minBytes: number;
  maxBytes: number;
  defaultBytes: number;
  baseSeconds: number;
  fastLinkSeconds: number;
  slowLinkSeconds: number;
  // observed rate above bitrate * this factor counts as a fast link
  fastLinkFactor: number;
  sizeTiers: ReadonlyArray<{ maxSize: number; bytes: number }>;
  largestTierBytes: number;
}

export const DEFAULT_BUFFER_POLICY: BufferPolicy = {
  minBytes: config.MIN_BUFFER,
  maxBytes: config.MAX_BUFFER,
  defaultBytes: config.DEFAULT_BUFFER,
  baseSeconds: 30,
  fastLinkSeconds: 20,
  slowLinkSeconds: 60,
  fastLinkFactor: 1.5,
  sizeTiers: [
    { maxSize: 500 * MB, bytes: 10 * MB },
    { maxSize: 1536 * MB, bytes: 30 * MB }
  ],
  largestTierBytes: 50 * MB
};

export class BufferTargetCalculator {
  constructor(
    private readonly probe: IMediaProbe,
    private readonly policy: BufferPolicy = DEFAULT_BUFFER_POLICY
  ) { }

  /**
   * Pure target computation from whatever is known about the media
   */
  compute(media: MediaProbe | null, observedRateBps: number): BufferTarget {
    const bitrate = media?.bitrateBytesPerSec ?? null;

    if (bitrate !== null && bitrate > 0) {
      let seconds = this.policy.baseSeconds;
      if (observedRateBps > this.policy.fastLinkFactor * bitrate) {
        seconds = this.policy.fastLinkSeconds;
      } else if (observedRateBps < bitrate) {
        seconds = this.policy.slowLinkSeconds;
      }
      return { bytes: this.clamp(bitrate * seconds), basis: 'bitrate' };
    }

    const size = media?.sizeBytes ?? null;
    if (size !== null && size > 0) {
      const tier = this.policy.sizeTiers.find((candidate) => size < candidate.maxSize);
      return { bytes: this.clamp(tier ? tier.bytes : this.policy.largestTierBytes), basis: 'size-tier' };
    }

    return { bytes: this.clamp(this.policy.defaultBytes), basis: 'default' };
  }

  /**
   * Probes the media file (when there is one) and computes the target.
   * Callable before the file is fully materialized.
   */
  async estimate(mediaPath: string | null, observedRateBps: number): Promise<BufferTarget> {
    if (mediaPath === null) {
      return this.compute(null, observedRateBps);
    }

    const probed = await this.probe.probe(mediaPath);
    if (probed !== null) {
      return this.compute(probed, observedRateBps);
    }

    // Probe failed: fall back to what the filesystem says
    try {
      const stats = await fs.promises.stat(mediaPath);
      return this.compute({ bitrateBytesPerSec: null, sizeBytes: stats.size }, observedRateBps);
    } catch {
      return this.compute(null, observedRateBps);
    }
  }

  private clamp(bytes: number): number {
    return Math.round(Math.min(this.policy.maxBytes, Math.max(this.policy.minBytes, bytes)));
  }
}
