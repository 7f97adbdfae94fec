import * as fs from 'fs';
import * as path from 'path';

export class FileResolver {
  /**
   * Finds the export for a prefix and date tag, e.g. snds-data-2025-11-01.csv.
   * The plain file is preferred over the gzipped one.
   * @returns The path of the first candidate that exists, or null.
   */
  static findFile(dataDir: string, prefix: string, tag: string): string | null {
    const candidates = [
      path.join(dataDir, `${prefix}-${tag}.csv`),
      path.join(dataDir, `${prefix}-${tag}.csv.gz`),
    ];
    for (const candidate of candidates) {
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }
    return null;
  }
}
