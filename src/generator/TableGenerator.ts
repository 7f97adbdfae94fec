import { DataRow } from '../model/DataSheet';

const COLUMN_SEPARATOR = '  ';

export class TableGenerator {
  /**
   * Renders keyed rows as a fixed-width text table.
   * @param rows Rows keyed by column name.
   * @param columns Columns to show, in order. Absent values render empty.
   * @param limit Maximum number of rows to show, 0 for all of them.
   */
  static tabulate(rows: DataRow[], columns: string[], limit: number): string {
    const values = this.limitRows(rows, limit).map(row =>
      columns.map(column => (Object.prototype.hasOwnProperty.call(row, column) ? row[column] : ''))
    );
    return this.render(columns, values);
  }

  /**
   * Renders positional rows under the given header. Cells past the end of a
   * row render empty.
   */
  static tabulateRows(header: string[], rows: string[][], limit: number): string {
    const values = this.limitRows(rows, limit).map(row => header.map((_, idx) => row[idx] ?? ''));
    return this.render(header, values);
  }

  private static limitRows<T>(rows: T[], limit: number): T[] {
    return limit > 0 ? rows.slice(0, limit) : rows;
  }

  private static render(header: string[], rows: string[][]): string {
    const widths = header.map((title, idx) =>
      rows.reduce((max, row) => Math.max(max, this.displayLength(row[idx])), this.displayLength(title))
    );

    const formatRow = (cells: string[]): string =>
      cells.map((cell, idx) => this.padEnd(cell, widths[idx])).join(COLUMN_SEPARATOR);

    const lines = [
      formatRow(header),
      formatRow(widths.map(width => '-'.repeat(width))),
      ...rows.map(formatRow),
    ];
    return lines.join('\n');
  }

  // Counted in code points so astral characters take one column, not two.
  private static displayLength(value: string): number {
    return Array.from(value).length;
  }

  private static padEnd(value: string, width: number): string {
    return value + ' '.repeat(Math.max(0, width - this.displayLength(value)));
  }
}
