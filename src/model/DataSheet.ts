// src/model/DataSheet.ts

export type DataRow = { [columnName: string]: string };

export interface DataSheet {
  name: string;
  columnNames: string[];
  rows: DataRow[];
}

export interface RawSheet {
  name: string;
  rows: string[][];
}
