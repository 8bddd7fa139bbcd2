/**
 * Immutable value object for a magnet URI
 * Keeps the remaining parameters verbatim and rebuilds the canonical form
 */

const MAGNET_PREFIX = 'magnet:';
const BTIH_PREFIX = 'urn:btih:';
// 40 hex characters, or the 32 character base32 form
const INFO_HASH_PATTERN = /^(?:[a-f0-9]{40}|[a-z2-7]{32})$/i;

type MagnetParam = readonly [key: string, value: string];

export class MagnetLink {
  private constructor(
    public readonly infoHash: string,
    private readonly params: readonly MagnetParam[]
  ) { }

  /**
   * Parses a magnet URI, returns null when no usable info hash is present
   */
  static parse(raw: string): MagnetLink | null {
    const trimmed = raw.trim();
    if (!trimmed.toLowerCase().startsWith(MAGNET_PREFIX)) {
      return null;
    }

    const query = trimmed.slice(MAGNET_PREFIX.length).replace(/^\?/, '');
    const segments = query.split('&').filter((segment) => segment.length > 0);

    let infoHash: string | null = null;
    const params: MagnetParam[] = [];

    for (const segment of segments) {
      const separator = segment.indexOf('=');

      // "magnet:<hash>" without any xt= parameter
      if (separator === -1) {
        const bare = segment.toLowerCase().startsWith(BTIH_PREFIX) ? segment.slice(BTIH_PREFIX.length) : segment;
        if (infoHash === null && INFO_HASH_PATTERN.test(bare)) {
          infoHash = bare.toLowerCase();
        }
        continue;
      }

      const key = segment.slice(0, separator);
      const value = segment.slice(separator + 1);

      if (key.toLowerCase() === 'xt' && value.toLowerCase().startsWith(BTIH_PREFIX)) {
        const candidate = value.slice(BTIH_PREFIX.length);
        if (infoHash === null && INFO_HASH_PATTERN.test(candidate)) {
          infoHash = candidate.toLowerCase();
        }
        continue;
      }

      params.push([key, value]);
    }

    return infoHash === null ? null : new MagnetLink(infoHash, params);
  }

  /**
   * Decoded tracker URLs carried by the link
   */
  get trackers(): string[] {
    return this.params
      .filter(([key]) => key.toLowerCase() === 'tr')
      .map(([, value]) => safeDecode(value));
  }

  /**
   * Decoded dn= parameter, null when absent
   */
  get displayName(): string | null {
    const entry = this.params.find(([key]) => key.toLowerCase() === 'dn');
    if (!entry) {
      return null;
    }
    const name = safeDecode(entry[1].replace(/\+/g, ' ')).trim();
    return name.length > 0 ? name : null;
  }

  hasTrackers(): boolean {
    return this.params.some(([key]) => key.toLowerCase() === 'tr');
  }

  /**
   * Returns a copy with the given trackers appended as URL-encoded tr= parameters
   */
  withTrackers(trackers: readonly string[]): MagnetLink {
    const appended: MagnetParam[] = trackers.map((tracker) => ['tr', encodeURIComponent(tracker)]);
    return new MagnetLink(this.infoHash, [...this.params, ...appended]);
  }

  toString(): string {
    const rest = this.params.map(([key, value]) => `&${key}=${value}`).join('');
    return `${MAGNET_PREFIX}?xt=${BTIH_PREFIX}${this.infoHash}${rest}`;
  }
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
