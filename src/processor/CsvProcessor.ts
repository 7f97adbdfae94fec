import * as Papa from 'papaparse';
import { DataRow, DataSheet } from '../model/DataSheet';

const BYTE_ORDER_MARK = '\uFEFF';

export class CsvProcessor {
  /**
   * Parses a CSV string into raw rows using PapaParse.
   * The header, when there is one, is returned as the first row.
   * @param csvString The CSV string to parse.
   * @returns Every non-blank row as an array of field values.
   */
  static parseCSV(csvString: string): string[][] {
    const text = csvString.startsWith(BYTE_ORDER_MARK) ? csvString.slice(1) : csvString;

    const result = Papa.parse<string[]>(text, {
      header: false, // Rows stay positional, headers are mapped by the caller
      delimiter: ',', // SNDS exports are always comma separated
      skipEmptyLines: true,
    });

    // Stray or unterminated quotes still leave the field text in result.data
    const errors = result.errors.filter(e => e.type !== 'Quotes');
    if (errors.length > 0) {
      throw new Error(`Error parsing CSV: ${errors.map(e => `${e.message} (row ${e.row})`).join(', ')}`);
    }

    return result.data;
  }

  /**
   * Maps raw rows onto the header row. Short rows get empty strings for the
   * missing fields and fields past the end of the header are dropped. A
   * repeated header name is listed once and keeps the value of its last column.
   * @param name Name given to the resulting sheet.
   * @param rows Raw rows, header first.
   */
  static toDataSheet(name: string, rows: string[][]): DataSheet {
    if (rows.length === 0) {
      return { name, columnNames: [], rows: [] };
    }

    const [headers, ...body] = rows;

    const dataRows: DataRow[] = body.map(row =>
      // fromEntries defines own properties, so a "__proto__" header stays a column
      Object.fromEntries(headers.map((header, idx): [string, string] => [header, row[idx] ?? '']))
    );

    return {
      name,
      columnNames: [...new Set(headers)],
      rows: dataRows,
    };
  }
}
