import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { BufferTargetCalculator } from './BufferTargetCalculator';
import { IMediaProbe } from '../../domain/interfaces';

const MB = 1024 * 1024;

describe('BufferTargetCalculator', () => {
    const probe: IMediaProbe = { probe: vi.fn().mockResolvedValue(null) };
    const calculator = new BufferTargetCalculator(probe);

    describe('compute', () => {
        it('should use 30 seconds of bitrate when the link keeps up', () => {
            const bitrate = 1 * MB;
            const target = calculator.compute({ bitrateBytesPerSec: bitrate, sizeBytes: null }, 1.2 * MB);

            expect(target).toEqual({ bytes: 30 * MB, basis: 'bitrate' });
        });

        it('should shorten to 20 seconds on a fast link', () => {
            const target = calculator.compute({ bitrateBytesPerSec: 1 * MB, sizeBytes: null }, 2 * MB);

            expect(target).toEqual({ bytes: 20 * MB, basis: 'bitrate' });
        });

        it('should lengthen to 60 seconds on a slow link', () => {
            const target = calculator.compute({ bitrateBytesPerSec: 1 * MB, sizeBytes: null }, 0.5 * MB);

            expect(target).toEqual({ bytes: 60 * MB, basis: 'bitrate' });
        });

        it('should treat exactly the bitrate as keeping up', () => {
            const target = calculator.compute({ bitrateBytesPerSec: 1 * MB, sizeBytes: null }, 1 * MB);

            expect(target.bytes).toBe(30 * MB);
        });

        it('should clamp bitrate targets to the allowed range', () => {
            const high = calculator.compute({ bitrateBytesPerSec: 10 * MB, sizeBytes: null }, 0);
            const low = calculator.compute({ bitrateBytesPerSec: 100 * 1024, sizeBytes: null }, 10 * MB);

            expect(high.bytes).toBe(200 * MB);
            expect(low.bytes).toBe(10 * MB);
        });

        it('should pick size tiers when the bitrate is unknown', () => {
            const small = calculator.compute({ bitrateBytesPerSec: null, sizeBytes: 400 * MB }, 0);
            const medium = calculator.compute({ bitrateBytesPerSec: null, sizeBytes: 1000 * MB }, 0);
            const large = calculator.compute({ bitrateBytesPerSec: null, sizeBytes: 4000 * MB }, 0);

            expect(small).toEqual({ bytes: 10 * MB, basis: 'size-tier' });
            expect(medium).toEqual({ bytes: 30 * MB, basis: 'size-tier' });
            expect(large).toEqual({ bytes: 50 * MB, basis: 'size-tier' });
        });

        it('should fall back to the default when nothing is known', () => {
            expect(calculator.compute(null, 0)).toEqual({ bytes: 50 * MB, basis: 'default' });
        });
    });

    describe('estimate', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'buffer-target-'));
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        it('should use the default without a media path', async () => {
            const target = await calculator.estimate(null, 0);

            expect(target.basis).toBe('default');
        });

        it('should use the probed bitrate', async () => {
            const bitrateProbe: IMediaProbe = {
                probe: vi.fn().mockResolvedValue({ bitrateBytesPerSec: 2 * MB, sizeBytes: 900 * MB })
            };

            const target = await new BufferTargetCalculator(bitrateProbe).estimate('/media/movie.mkv', 2 * MB);

            expect(bitrateProbe.probe).toHaveBeenCalledWith('/media/movie.mkv');
            expect(target).toEqual({ bytes: 60 * MB, basis: 'bitrate' });
        });

        it('should fall back to the file size when the probe fails', async () => {
            const file = path.join(tmpDir, 'movie.mp4');
            fs.writeFileSync(file, Buffer.alloc(1024));

            const target = await calculator.estimate(file, 0);

            expect(target).toEqual({ bytes: 10 * MB, basis: 'size-tier' });
        });

        it('should degrade to the default when the file is missing', async () => {
            const target = await calculator.estimate(path.join(tmpDir, 'missing.mp4'), 0);

            expect(target.basis).toBe('default');
        });
    });
});
