import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { TransmissionConfigOverride } from './TransmissionConfigOverride';
import { ILogger } from '../../domain/interfaces';

describe('TransmissionConfigOverride', () => {
    let configDir: string;
    let settingsPath: string;
    let mockLogger: ILogger;

    beforeEach(() => {
        configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'transmission-config-'));
        settingsPath = path.join(configDir, 'settings.json');
        mockLogger = {
            log: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            info: vi.fn(),
            debug: vi.fn()
        };
    });

    afterEach(() => {
        fs.rmSync(configDir, { recursive: true, force: true });
    });

    it('should set download-dir and keep other settings', async () => {
        fs.writeFileSync(settingsPath, JSON.stringify({ 'download-dir': '/home/user/Downloads', 'peer-port': 51413 }));
        const override = new TransmissionConfigOverride(configDir, '/tmp/session-cache', mockLogger);

        await override.apply();

        expect(JSON.parse(fs.readFileSync(settingsPath, 'utf8'))).toEqual({
            'download-dir': '/tmp/session-cache',
            'peer-port': 51413
        });
    });

    it('should restore the original file byte for byte', async () => {
        const original = '{\n  "download-dir": "/home/user/Downloads",\n  "speed-limit-up": 50\n}\n';
        fs.writeFileSync(settingsPath, original);
        const override = new TransmissionConfigOverride(configDir, '/tmp/session-cache', mockLogger);

        await override.apply();
        await override.release();

        expect(fs.readFileSync(settingsPath, 'utf8')).toBe(original);
    });

    it('should delete the file when it did not exist before', async () => {
        const override = new TransmissionConfigOverride(configDir, '/tmp/session-cache', mockLogger);

        await override.apply();
        expect(fs.existsSync(settingsPath)).toBe(true);

        await override.release();
        expect(fs.existsSync(settingsPath)).toBe(false);
    });

    it('should release only once', async () => {
        const original = '{"download-dir": "/a"}';
        fs.writeFileSync(settingsPath, original);
        const override = new TransmissionConfigOverride(configDir, '/tmp/session-cache', mockLogger);

        await override.apply();
        await override.release();
        fs.writeFileSync(settingsPath, '{"download-dir": "/changed-later"}');
        await override.release();

        expect(fs.readFileSync(settingsPath, 'utf8')).toBe('{"download-dir": "/changed-later"}');
        expect(override.applied).toBe(false);
    });

    it('should replace unparseable settings for the session', async () => {
        fs.writeFileSync(settingsPath, 'not json');
        const override = new TransmissionConfigOverride(configDir, '/tmp/session-cache', mockLogger);

        await override.apply();
        expect(JSON.parse(fs.readFileSync(settingsPath, 'utf8'))).toEqual({ 'download-dir': '/tmp/session-cache' });

        await override.release();
        expect(fs.readFileSync(settingsPath, 'utf8')).toBe('not json');
    });
});
