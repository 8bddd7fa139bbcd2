/**
 * Scoped override of transmission's persisted download directory
 *
 * transmission-cli reads settings.json on start and may ignore the command
 * line download dir in favour of it, so the file is patched for the duration
 * of the session and restored byte for byte afterwards.
 */

import fs from 'fs';
import path from 'path';
import { ILogger } from '../../domain/interfaces';

export interface ScopedOverride {
  apply(): Promise<void>;
  /**
   * Restores the original state. Safe to call more than once.
   */
  release(): Promise<void>;
}

export class TransmissionConfigOverride implements ScopedOverride {
  // undefined: not applied, null: settings.json did not exist
  private original: string | null | undefined = undefined;
  private readonly settingsPath: string;

  constructor(
    configDir: string,
    private readonly downloadDir: string,
    private readonly logger: ILogger
  ) {
    this.settingsPath = path.join(configDir, 'settings.json');
  }

  get applied(): boolean {
    return this.original !== undefined;
  }

  async apply(): Promise<void> {
    if (this.applied) {
      return;
    }

    let current: string | null = null;
    try {
      current = await fs.promises.readFile(this.settingsPath, 'utf8');
    } catch {
      current = null;
    }

    const settings = parseSettings(current);
    settings['download-dir'] = this.downloadDir;

    await fs.promises.mkdir(path.dirname(this.settingsPath), { recursive: true });
    await fs.promises.writeFile(this.settingsPath, `${JSON.stringify(settings, null, 4)}\n`);
    this.original = current;

    this.logger.debug(`Transmission download-dir set to ${this.downloadDir}`);
  }

  async release(): Promise<void> {
    const original = this.original;
    if (original === undefined) {
      return;
    }
    this.original = undefined;

    try {
      if (original === null) {
        await fs.promises.rm(this.settingsPath, { force: true });
      } else {
        await fs.promises.writeFile(this.settingsPath, original);
      }
      this.logger.debug('Transmission settings restored');
    } catch (error) {
      this.logger.error(`Failed to restore ${this.settingsPath}:`, error);
      throw error;
    }
  }
}

function parseSettings(raw: string | null): Record<string, unknown> {
  if (raw === null) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // Unparseable settings are replaced for the session and restored verbatim
    return {};
  }
  return {};
}
