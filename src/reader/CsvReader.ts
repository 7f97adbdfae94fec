import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { CsvProcessor } from '../processor/CsvProcessor';
import { DataSheet, RawSheet } from '../model/DataSheet';

const GZIP_EXTENSION = '.gz';

export class CsvReader {
  /**
   * Reads a CSV file whose first row is the header.
   * A file without any row gives a sheet with no columns and no rows.
   * @param filePath Path to a .csv or .csv.gz file.
   */
  static readCsvRecords(filePath: string): DataSheet {
    const rows = this.readRows(filePath);
    return CsvProcessor.toDataSheet(path.basename(filePath), rows);
  }

  /**
   * Reads every row of a CSV file, header included, without interpreting it.
   * @param filePath Path to a .csv or .csv.gz file.
   */
  static readCsvRows(filePath: string): RawSheet {
    return {
      name: path.basename(filePath),
      rows: this.readRows(filePath),
    };
  }

  /**
   * Loads the file as UTF-8 text, gunzipping it first when the name ends in .gz.
   */
  static readText(filePath: string): string {
    try {
      const content = fs.readFileSync(filePath);
      const bytes = path.extname(filePath) === GZIP_EXTENSION ? zlib.gunzipSync(content) : content;
      return bytes.toString('utf8');
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Error reading CSV file "${filePath}": ${message}`);
    }
  }

  private static readRows(filePath: string): string[][] {
    const csvString = this.readText(filePath);
    try {
      return CsvProcessor.parseCSV(csvString);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Error parsing CSV file "${filePath}": ${message}`);
    }
  }
}
