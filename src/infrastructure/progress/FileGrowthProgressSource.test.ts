import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileGrowthProgressSource, parsePeerLine } from './FileGrowthProgressSource';

describe('FileGrowthProgressSource', () => {
    let tmpDir: string;
    let video: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'file-growth-'));
        video = path.join(tmpDir, 'movie.mp4');
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should compute the rate from growth between samples', async () => {
        let clock = 1000;
        const source = new FileGrowthProgressSource({ now: () => clock });
        source.attachMedia(video);

        fs.writeFileSync(video, Buffer.alloc(1000));
        const first = await source.read();

        fs.appendFileSync(video, Buffer.alloc(2000));
        clock += 500;
        const second = await source.read();

        expect(first).toEqual({ bytesDownloaded: 1000 });
        expect(second).toEqual({ bytesDownloaded: 3000, rateBps: 4000 });
    });

    it('should measure the download directory before media is attached', async () => {
        fs.mkdirSync(path.join(tmpDir, 'sub'));
        fs.writeFileSync(path.join(tmpDir, 'sub', 'part'), Buffer.alloc(700));
        const source = new FileGrowthProgressSource({ downloadDir: tmpDir });

        expect((await source.read()).bytesDownloaded).toBe(700);
    });

    it('should report nothing when the file does not exist yet', async () => {
        const source = new FileGrowthProgressSource();
        source.attachMedia(video);

        expect(await source.read()).toEqual({});
    });

    it('should read peers from captured output', async () => {
        const output = 'info streaming movie.mp4 - 1.2MB/s from 4/20 peers\ninfo streaming movie.mp4 - 1.5MB/s from 6/21 peers\n';
        const source = new FileGrowthProgressSource({ readOutput: () => output });

        expect(await source.read()).toEqual({ peersConnected: 6, peersTotal: 21 });
    });

    it('should return no peers when none are reported', () => {
        expect(parsePeerLine('server is listening on port 8888\n')).toEqual({});
    });
});
