import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PreferencesStore } from './PreferencesStore';

describe('PreferencesStore', () => {
    let tmpDir: string;
    let filePath: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'preferences-'));
        filePath = path.join(tmpDir, 'nested', 'config');
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should return the fallback for a missing file', () => {
        const store = new PreferencesStore(filePath);

        expect(store.get('PLAYER')).toBeNull();
        expect(store.get('QUALITY', '1080p')).toBe('1080p');
    });

    it('should write and replace keys in place', () => {
        const store = new PreferencesStore(filePath);

        store.set('PLAYER', 'vlc');
        store.set('QUALITY', '720p');
        store.set('PLAYER', 'mpv');

        expect(fs.readFileSync(filePath, 'utf8')).toBe('QUALITY=720p\nPLAYER=mpv\n');
        expect(store.get('PLAYER')).toBe('mpv');
    });

    it('should keep values containing equals signs', () => {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, 'THEME=dark\nEXTRA=a=b\n# comment\n');
        const store = new PreferencesStore(filePath);

        expect(store.get('EXTRA')).toBe('a=b');
        expect(store.get('THEME')).toBe('dark');
    });

    it('should only accept known players', () => {
        const store = new PreferencesStore(filePath);

        store.setPlayer('auto');
        expect(store.getPlayer()).toBeNull();

        store.setPlayer('vlc');
        expect(store.getPlayer()).toBe('vlc');
    });

    it('should reject malformed keys and multi-line values', () => {
        const store = new PreferencesStore(filePath);

        expect(() => store.set('player', 'mpv')).toThrow('Invalid preference key');
        expect(() => store.set('PLAYER', 'mpv\nEVIL=1')).toThrow('single-line');
    });
});
