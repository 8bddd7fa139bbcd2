/**
 * User preferences persisted as KEY=value lines
 */

import fs from 'fs';
import path from 'path';
import config from '../../config';
import { PlayerKind } from '../../domain/entities';
import { isPlayerKind } from '../player/PlayerDetector';

const KEY_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export class PreferencesStore {
  constructor(private readonly filePath: string = config.PREFERENCES_FILE) { }

  get(key: string): string | null;
  get(key: string, fallback: string): string;
  get(key: string, fallback: string | null = null): string | null {
    const value = this.readAll().get(key);
    return value === undefined || value === '' ? fallback : value;
  }

  /**
   * Replaces the key in place, keeping other lines and their order
   */
  set(key: string, value: string): void {
    if (!KEY_PATTERN.test(key)) {
      throw new Error(`Invalid preference key: ${key}`);
    }
    if (/[\r\n]/.test(value)) {
      throw new Error(`Preference values must be single-line: ${key}`);
    }

    const lines = this.readLines().filter((line) => !line.startsWith(`${key}=`));
    lines.push(`${key}=${value}`);

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, `${lines.join('\n')}\n`);
  }

  /**
   * Configured player, null for "auto" or anything unknown
   */
  getPlayer(): PlayerKind | null {
    const value = this.get('PLAYER');
    return value !== null && isPlayerKind(value) ? value : null;
  }

  setPlayer(player: PlayerKind | 'auto'): void {
    this.set('PLAYER', player);
  }

  private readAll(): Map<string, string> {
    const values = new Map<string, string>();
    for (const line of this.readLines()) {
      const separator = line.indexOf('=');
      if (separator <= 0) {
        continue;
      }
      // Last assignment wins
      values.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
    }
    return values;
  }

  private readLines(): string[] {
    try {
      return fs
        .readFileSync(this.filePath, 'utf8')
        .split(/\r?\n/)
        .filter((line) => line.length > 0);
    } catch {
      return [];
    }
  }
}
