/**
 * Utility for formatting and parsing byte values
 */
export class ByteFormatter {
  private static readonly GB = 1024 * 1024 * 1024;
  private static readonly MB = 1024 * 1024;
  private static readonly KB = 1024;

  private static readonly UNIT_FACTORS: Record<string, number> = {
    b: 1,
    kb: 1024,
    kib: 1024,
    mb: 1024 * 1024,
    mib: 1024 * 1024,
    gb: 1024 * 1024 * 1024,
    gib: 1024 * 1024 * 1024
  };

  /**
   * Formats bytes to MB with 2 decimal places
   */
  static toMB(bytes: number): string {
    return `${(bytes / this.MB).toFixed(2)} MB`;
  }

  /**
   * Whole megabytes, as written to the status artifact
   */
  static toWholeMB(bytes: number): number {
    return Math.floor(bytes / this.MB);
  }

  /**
   * Formats bytes to human-readable format
   */
  static toHumanReadable(bytes: number): string {
    if (bytes >= this.GB) {
      return `${(bytes / this.GB).toFixed(2)} GB`;
    }
    if (bytes >= this.MB) {
      return `${(bytes / this.MB).toFixed(2)} MB`;
    }
    if (bytes >= this.KB) {
      return `${(bytes / this.KB).toFixed(2)} KB`;
    }
    return `${bytes} B`;
  }

  /**
   * Formats a transfer rate with one decimal place, empty for zero
   */
  static toRate(bytesPerSecond: number): string {
    if (bytesPerSecond > this.MB) {
      return `${(bytesPerSecond / this.MB).toFixed(1)} MB/s`;
    }
    if (bytesPerSecond > this.KB) {
      return `${(bytesPerSecond / this.KB).toFixed(1)} KB/s`;
    }
    if (bytesPerSecond > 0) {
      return `${Math.round(bytesPerSecond)} B/s`;
    }
    return '';
  }

  /**
   * Parses "1.38 MB/s", "512 kB/s" or "2 MiB" into bytes
   * @returns null when the text is not a recognizable size
   */
  static parse(text: string): number | null {
    const match = /^\s*(\d+(?:\.\d+)?)\s*([kmg]i?b|b)(?:\/s)?\s*$/i.exec(text);
    if (!match) {
      return null;
    }
    const factor = this.UNIT_FACTORS[match[2].toLowerCase()];
    return factor === undefined ? null : Math.round(parseFloat(match[1]) * factor);
  }

  /**
   * Formats percentage with 1 decimal place
   */
  static toPercentage(value: number, total: number): string {
    return `${((value / total) * 100).toFixed(1)}%`;
  }
}
