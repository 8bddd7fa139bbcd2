/**
 * Unit tests for ByteFormatter
 */

import { describe, it, expect } from 'vitest';
import { ByteFormatter } from './ByteFormatter';

describe('ByteFormatter', () => {
    it('should format human readable sizes', () => {
        expect(ByteFormatter.toHumanReadable(512)).toBe('512 B');
        expect(ByteFormatter.toHumanReadable(1536)).toBe('1.50 KB');
        expect(ByteFormatter.toHumanReadable(5 * 1024 * 1024)).toBe('5.00 MB');
        expect(ByteFormatter.toHumanReadable(3 * 1024 * 1024 * 1024)).toBe('3.00 GB');
    });

    it('should floor to whole megabytes', () => {
        expect(ByteFormatter.toWholeMB(25 * 1024 * 1024 + 1)).toBe(25);
        expect(ByteFormatter.toWholeMB(1000)).toBe(0);
    });

    it('should format rates with one decimal', () => {
        expect(ByteFormatter.toRate(1.5 * 1024 * 1024)).toBe('1.5 MB/s');
        expect(ByteFormatter.toRate(2048)).toBe('2.0 KB/s');
        expect(ByteFormatter.toRate(100)).toBe('100 B/s');
        expect(ByteFormatter.toRate(0)).toBe('');
    });

    it('should parse rates and sizes', () => {
        expect(ByteFormatter.parse('1.5 MB/s')).toBe(1572864);
        expect(ByteFormatter.parse('512 kB/s')).toBe(524288);
        expect(ByteFormatter.parse('2 MiB')).toBe(2097152);
        expect(ByteFormatter.parse('10 B/s')).toBe(10);
    });

    it('should return null for unparseable text', () => {
        expect(ByteFormatter.parse('fast')).toBeNull();
        expect(ByteFormatter.parse('12 parsecs')).toBeNull();
    });
});
