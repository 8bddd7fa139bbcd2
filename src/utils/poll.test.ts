/**
 * Unit tests for the polling primitives
 */

import { describe, it, expect, vi } from 'vitest';
import { pollUntil, sleep } from './poll';
import { SessionErrorCode } from '../domain/errors/SessionError';

describe('poll', () => {
    describe('sleep', () => {
        it('should reject immediately when already aborted', async () => {
            const controller = new AbortController();
            controller.abort();

            await expect(sleep(1000, controller.signal)).rejects.toMatchObject({ code: SessionErrorCode.CANCELLED });
        });

        it('should reject when aborted while waiting', async () => {
            const controller = new AbortController();
            const pending = sleep(10_000, controller.signal);
            controller.abort();

            await expect(pending).rejects.toMatchObject({ code: SessionErrorCode.CANCELLED });
        });
    });

    describe('pollUntil', () => {
        it('should return the first non-null value', async () => {
            let calls = 0;
            const probe = vi.fn(() => (++calls >= 3 ? 'found' : null));

            const result = await pollUntil(probe, { intervalMs: 1, timeoutMs: 1000 });

            expect(result).toBe('found');
            expect(probe).toHaveBeenCalledTimes(3);
        });

        it('should return null once the deadline passes', async () => {
            const result = await pollUntil(() => null, { intervalMs: 5, timeoutMs: 20 });

            expect(result).toBeNull();
        });

        it('should accept async probes', async () => {
            const result = await pollUntil(async () => 42, { intervalMs: 1, timeoutMs: 10 });

            expect(result).toBe(42);
        });

        it('should stop with a cancellation error on abort', async () => {
            const controller = new AbortController();
            const pending = pollUntil(() => null, { intervalMs: 5, timeoutMs: 10_000, signal: controller.signal });
            setTimeout(() => controller.abort(), 10);

            await expect(pending).rejects.toMatchObject({ code: SessionErrorCode.CANCELLED });
        });
    });
});
