import * as fs from 'fs';
import { ShowOptions } from '../model/ShowOptions';
import { SNDS_FILE_KINDS, SndsFileKind, SndsFileType, selectedFileTypes } from '../model/SndsFileType';
import { FileResolver } from '../reader/FileResolver';
import { CsvReader } from '../reader/CsvReader';
import { ColumnSelector, FALLBACK_COLUMN_COUNT } from './ColumnSelector';
import { TableGenerator } from '../generator/TableGenerator';
import { ShowOutput, consoleOutput } from './ShowOutput';

export const EXIT_OK = 0;
export const EXIT_MISSING_DATA_DIR = 2;

export class SndsProcessor {
  /**
   * Shows every selected SNDS export for the date tag.
   * A missing or unreadable file only skips its own section.
   * @returns The process exit code.
   */
  static run(options: ShowOptions, output: ShowOutput = consoleOutput): number {
    if (!fs.existsSync(options.dataDir)) {
      output.err(`ERROR: Data directory not found: ${options.dataDir}`);
      return EXIT_MISSING_DATA_DIR;
    }

    for (const type of selectedFileTypes(options.type)) {
      this.processFileType(type, options, output);
    }

    return EXIT_OK;
  }

  private static processFileType(type: SndsFileType, options: ShowOptions, output: ShowOutput): void {
    const kind = SNDS_FILE_KINDS[type];
    const filePath = FileResolver.findFile(options.dataDir, kind.prefix, options.dateTag);
    if (filePath === null) {
      output.err(`ERROR: Could not find ${kind.prefix}-${options.dateTag}.csv(.gz) in ${options.dataDir}`);
      return;
    }

    try {
      if (type === 'data') {
        this.showData(kind, filePath, options, output);
      } else {
        this.showIpStatus(kind, filePath, options, output);
      }
    } catch (error: unknown) {
      output.err(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private static showData(kind: SndsFileKind, filePath: string, options: ShowOptions, output: ShowOutput): void {
    const dataSheet = CsvReader.readCsvRecords(filePath);
    output.out(this.sectionHeader(kind, dataSheet.name, dataSheet.rows.length));

    if (dataSheet.rows.length === 0) {
      output.out('(No rows)');
      return;
    }

    const columns = options.columns ?? ColumnSelector.guessColumns(dataSheet, options.wishlist);
    output.out(TableGenerator.tabulate(dataSheet.rows, columns, options.limit));
  }

  // ipStatus headers are not reliable enough to select by name, so the first
  // columns are shown by position.
  private static showIpStatus(kind: SndsFileKind, filePath: string, options: ShowOptions, output: ShowOutput): void {
    const rawSheet = CsvReader.readCsvRows(filePath);
    output.out(this.sectionHeader(kind, rawSheet.name, Math.max(0, rawSheet.rows.length - 1)));

    if (rawSheet.rows.length === 0) {
      output.out('(Empty file)');
      return;
    }

    const [header, ...body] = rawSheet.rows;
    output.out(TableGenerator.tabulateRows(header.slice(0, FALLBACK_COLUMN_COUNT), body, options.limit));
  }

  private static sectionHeader(kind: SndsFileKind, fileName: string, rowCount: number): string {
    return `\n=== ${kind.label}: ${fileName} (${rowCount} rows) ===`;
  }
}
