// src/model/SndsFileType.ts

export type SndsFileType = 'data' | 'ipstatus';

export type SndsTypeSelector = SndsFileType | 'both';

export const SNDS_TYPE_SELECTORS: readonly SndsTypeSelector[] = ['data', 'ipstatus', 'both'];

export interface SndsFileKind {
  type: SndsFileType;
  prefix: string;
  label: string;
}

export const SNDS_FILE_KINDS: { [type in SndsFileType]: SndsFileKind } = {
  data: { type: 'data', prefix: 'snds-data', label: 'DATA' },
  ipstatus: { type: 'ipstatus', prefix: 'snds-ipStatus', label: 'IPSTATUS' },
};

export function isTypeSelector(value: string): value is SndsTypeSelector {
  return (SNDS_TYPE_SELECTORS as readonly string[]).includes(value);
}

/**
 * Expands a selector into the file types to process, in output order.
 */
export function selectedFileTypes(selector: SndsTypeSelector): SndsFileType[] {
  return selector === 'both' ? ['data', 'ipstatus'] : [selector];
}
