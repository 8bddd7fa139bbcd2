import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SplashOverlayLoop, formatOverlayText } from './SplashOverlayLoop';
import { MockControlChannel } from '../../__mocks__/controlChannel';
import { ProgressSnapshot } from '../../domain/entities';
import { ILogger } from '../../domain/interfaces';
import { StatusRecord } from '../progress/StatusRecord';
import { pollUntil } from '../../utils/poll';

const buffering: ProgressSnapshot = {
    percent: 37.8,
    bytesDownloaded: 4 * 1024 * 1024,
    downloadRateBps: 1.5 * 1024 * 1024,
    peersConnected: 3,
    peersTotal: 10,
    state: 'BUFFERING'
};

describe('SplashOverlayLoop', () => {
    let mockLogger: ILogger;
    let channel: MockControlChannel;
    let record: StatusRecord;

    beforeEach(() => {
        mockLogger = {
            log: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            info: vi.fn(),
            debug: vi.fn()
        };
        channel = new MockControlChannel();
        record = new StatusRecord(mockLogger);
    });

    it('should format the buffering line', () => {
        expect(formatOverlayText('Test Movie', buffering)).toBe('Test Movie\nBuffering: 37% | 1.5 MB/s | 3/10 peers');
    });

    it('should send progress while buffering', async () => {
        record.publish(buffering);
        const loop = new SplashOverlayLoop(channel, record, 'Test Movie', mockLogger, 5);

        loop.start();
        await pollUntil(() => (channel.sent.length >= 2 ? true : null), { intervalMs: 5, timeoutMs: 1000 });
        await loop.stop();

        expect(channel.sent[0]).toEqual({
            command: ['show-text', 'Test Movie\nBuffering: 37% | 1.5 MB/s | 3/10 peers', 1000]
        });
    });

    it('should clear the OSD once and stop on READY', async () => {
        record.publish(buffering);
        const loop = new SplashOverlayLoop(channel, record, 'Test Movie', mockLogger, 5);

        loop.start();
        await pollUntil(() => (channel.sent.length >= 1 ? true : null), { intervalMs: 5, timeoutMs: 1000 });
        record.publish({ ...buffering, percent: 100, state: 'READY' });
        await pollUntil(
            () => (channel.sent.some((entry) => entry.command[2] === 0) ? true : null),
            { intervalMs: 5, timeoutMs: 1000 }
        );
        const sentAtReady = channel.sent.length;
        await new Promise((resolve) => setTimeout(resolve, 30));

        expect(channel.sent).toHaveLength(sentAtReady);
        expect(channel.sent[sentAtReady - 1]).toEqual({ command: ['show-text', '', 0] });
        expect(channel.sent.filter((entry) => entry.command[2] === 0)).toHaveLength(1);
        await loop.stop();
    });

    it('should send nothing after stop resolves', async () => {
        record.publish(buffering);
        const loop = new SplashOverlayLoop(channel, record, 'Test Movie', mockLogger, 5);

        loop.start();
        await loop.stop();
        const sentAtStop = channel.sent.length;
        await new Promise((resolve) => setTimeout(resolve, 30));

        expect(channel.sent).toHaveLength(sentAtStop);
        expect(loop.running).toBe(false);
    });

    it('should clear progress text left on screen when stopped', async () => {
        record.publish(buffering);
        const loop = new SplashOverlayLoop(channel, record, 'Test Movie', mockLogger, 5);

        loop.start();
        await pollUntil(() => (channel.sent.length >= 1 ? true : null), { intervalMs: 5, timeoutMs: 1000 });
        await loop.stop();

        expect(channel.sent[channel.sent.length - 1]).toEqual({ command: ['show-text', '', 0] });
        expect(channel.sent.filter((entry) => entry.command[2] === 0)).toHaveLength(1);
    });

    it('should not clear twice when stopped after READY', async () => {
        record.publish({ ...buffering, percent: 100, state: 'READY' });
        const loop = new SplashOverlayLoop(channel, record, 'Test Movie', mockLogger, 5);

        loop.start();
        await pollUntil(() => (channel.sent.length >= 1 ? true : null), { intervalMs: 5, timeoutMs: 1000 });
        await loop.stop();

        expect(channel.sent).toEqual([{ command: ['show-text', '', 0] }]);
    });

    it('should keep running when an update fails', async () => {
        record.publish(buffering);
        channel.failWith = new Error('EPIPE');
        const loop = new SplashOverlayLoop(channel, record, 'Test Movie', mockLogger, 5);

        loop.start();
        await new Promise((resolve) => setTimeout(resolve, 20));
        channel.failWith = null;
        await pollUntil(() => (channel.sent.length >= 1 ? true : null), { intervalMs: 5, timeoutMs: 1000 });
        await loop.stop();

        expect(channel.sent.length).toBeGreaterThanOrEqual(1);
    });

    it('should wait for the first snapshot before sending', async () => {
        const loop = new SplashOverlayLoop(channel, record, 'Test Movie', mockLogger, 5);

        loop.start();
        await new Promise((resolve) => setTimeout(resolve, 20));
        await loop.stop();

        expect(channel.sent).toHaveLength(0);
    });
});
