/**
 * Output patterns that mean the primary backend cannot handle this source
 * Generic "Error" or "Failed" text is deliberately absent: peerflix prints
 * both for recoverable tracker and peer hiccups.
 */

export const FATAL_SIGNATURES: readonly RegExp[] = [
  /Invalid data/i,
  /Missing delimiter/i,
  /Invalid (magnet|torrent|infohash)/i,
  /(malformed|corrupt(ed)?) torrent/i
];

/**
 * @returns The first output line matching a fatal signature, or null
 */
export function findFatalSignature(output: string): string | null {
  for (const line of output.split(/[\r\n]+/)) {
    if (FATAL_SIGNATURES.some((signature) => signature.test(line))) {
      return line.trim();
    }
  }
  return null;
}
