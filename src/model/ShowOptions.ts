// src/model/ShowOptions.ts
import { SndsTypeSelector } from './SndsFileType';

export const DEFAULT_LIMIT = 30;

export class ShowOptions {
  dataDir: string;
  dateTag: string;
  type: SndsTypeSelector;
  columns: string[] | null;
  limit: number;
  wishlist: string[];

  constructor(
    dataDir: string,
    dateTag: string,
    type: SndsTypeSelector,
    columns: string[] | null,
    limit: number,
    wishlist: string[]
  ) {
    this.dataDir = dataDir;
    this.dateTag = dateTag;
    this.type = type;
    this.columns = columns;
    this.limit = limit;
    this.wishlist = wishlist;
  }
}
