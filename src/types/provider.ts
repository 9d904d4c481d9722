import type { CsvRow, VaultRecord } from './record.js';

/** Column names that identify a provider's CSV header. */
export interface HeaderFingerprint {
  required: readonly string[];
  optional: readonly string[];
}

export interface ImportWarning {
  kind: 'unparsable-timestamp';
  provider: string;
  column: string;
  value: string;
  rowIndex?: number;
}

/** Receives non-fatal findings while a row is imported. */
export interface ImportContext {
  warn(warning: ImportWarning): void;
}

export interface ProviderPlugin {
  readonly providerId: string;
  readonly displayName: string;
  readonly headerFingerprint: HeaderFingerprint;
  /** Fixed column order written by `exportRow`. */
  readonly exportColumns: readonly string[];

  importRow(row: CsvRow, context?: ImportContext): VaultRecord;
  exportRow(record: VaultRecord): CsvRow;
}

export interface ProviderInfo {
  providerId: string;
  displayName: string;
  requiredColumns: string[];
  optionalColumns: string[];
  exportColumns: string[];
}

export function toProviderInfo(plugin: ProviderPlugin): ProviderInfo {
  return {
    providerId: plugin.providerId,
    displayName: plugin.displayName,
    requiredColumns: [...plugin.headerFingerprint.required],
    optionalColumns: [...plugin.headerFingerprint.optional],
    exportColumns: [...plugin.exportColumns],
  };
}
