import { DataSheet } from '../model/DataSheet';

// Field names seen across SNDS data exports; the exact set varies between exports.
export const DEFAULT_WISHLIST: readonly string[] = [
  'IP', 'ip', 'IPv4', 'ipv4',
  'Date', 'date',
  'Traffic', 'traffic',
  'ComplaintRate', 'complaintRate', 'complaints',
  'FilterResult', 'filterResult',
  'SRD', 'srd',
];

export const FALLBACK_COLUMN_COUNT = 8;

export class ColumnSelector {
  /**
   * Picks the columns to display from a prioritized wishlist.
   * Each wanted name resolves to an exact match, or else to a case-insensitive
   * one, or is skipped. When nothing matches, the first columns of the sheet
   * are used instead.
   * @param dataSheet The loaded sheet.
   * @param wanted Candidate column names, most important first.
   * @returns The selected column names, empty when the sheet has no rows.
   */
  static guessColumns(dataSheet: DataSheet, wanted: readonly string[]): string[] {
    if (dataSheet.rows.length === 0) {
      return [];
    }

    const available = dataSheet.columnNames;
    const lowerMap = new Map<string, string>();
    for (const name of available) {
      lowerMap.set(name.toLowerCase(), name);
    }

    const result: string[] = [];
    for (const name of wanted) {
      if (available.includes(name)) {
        result.push(name);
        continue;
      }
      const match = lowerMap.get(name.toLowerCase());
      if (match !== undefined) {
        result.push(match);
      }
    }

    if (result.length === 0) {
      return available.slice(0, FALLBACK_COLUMN_COUNT);
    }
    return result;
  }

  /**
   * Splits a comma-separated column list, e.g. "IP, Traffic,,SRD".
   */
  static parseColumnList(columnList: string): string[] {
    return columnList
      .split(',')
      .map(column => column.trim())
      .filter(column => column.length > 0);
  }
}
