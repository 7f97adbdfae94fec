// src/model/ShowConf.ts

// Values read from the optional YAML configuration file. Every key is optional.
export class ShowConf {
  dir?: string;
  limit?: number;
  columns?: string[];
  wishlist?: string[];

  constructor(dir?: string, limit?: number, columns?: string[], wishlist?: string[]) {
    this.dir = dir;
    this.limit = limit;
    this.columns = columns;
    this.wishlist = wishlist;
  }
}
