import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ShowConf } from '../model/ShowConf';
import { ColumnSelector } from '../processor/ColumnSelector';

type ConfData = { [key: string]: unknown };

export class ShowConfReader {
  /**
   * Reads the optional YAML configuration file.
   * Recognised keys are dir, limit, columns and wishlist; anything else is ignored.
   */
  static readConfFile(confFilePath: string): ShowConf {
    try {
      const confFileContent = fs.readFileSync(path.resolve(confFilePath), 'utf8');
      return this.parseConf(yaml.load(confFileContent));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Error reading or parsing configuration file: ${message}`);
    }
  }

  static parseConf(confData: unknown): ShowConf {
    // An empty YAML document loads as undefined
    if (confData === undefined || confData === null) {
      return new ShowConf();
    }
    if (!this.isConfData(confData)) {
      throw new Error('configuration must be a mapping');
    }

    return new ShowConf(
      this.parseString(confData, 'dir'),
      this.parseInteger(confData, 'limit'),
      this.parseColumns(confData, 'columns'),
      this.parseStringList(confData, 'wishlist')
    );
  }

  private static isConfData(value: unknown): value is ConfData {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  private static parseString(confData: ConfData, key: string): string | undefined {
    const value = confData[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new Error(`"${key}" must be a string`);
    }
    return value;
  }

  private static parseInteger(confData: ConfData, key: string): number | undefined {
    const value = confData[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new Error(`"${key}" must be an integer`);
    }
    return value;
  }

  private static parseStringList(confData: ConfData, key: string): string[] | undefined {
    const value = confData[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      throw new Error(`"${key}" must be a list of strings`);
    }
    return value;
  }

  // columns accepts the same comma-separated form as --columns, or a YAML list
  private static parseColumns(confData: ConfData, key: string): string[] | undefined {
    const value = confData[key];
    if (typeof value === 'string') {
      return ColumnSelector.parseColumnList(value);
    }
    return this.parseStringList(confData, key)?.map(column => column.trim()).filter(column => column.length > 0);
  }
}
