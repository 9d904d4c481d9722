import type { CsvRow, HeaderFingerprint, ImportContext, ProviderPlugin, VaultRecord } from '../types/index.js';
import { parseTimestamp } from '../vault/timestamp.js';
import { normalizeHeader } from '../vault/detect.js';
import { MissingRequiredColumnError, createLogger } from '../utils/index.js';

const log = createLogger('providers');

const LOGGING_CONTEXT: ImportContext = {
  warn: (warning) => {
    log.warn(`UnparsableTimestamp: ${warning.provider} column "${warning.column}" treated as unknown`);
  },
};

/**
 * Base class for provider plugins with the column bookkeeping every CSV
 * format needs. Subclasses map one row to a record (`fromRow`) and back
 * (`toRow`); the base checks required columns and fixes the export order.
 */
export abstract class BaseProvider implements ProviderPlugin {
  abstract readonly providerId: string;
  abstract readonly displayName: string;
  abstract readonly headerFingerprint: HeaderFingerprint;
  abstract readonly exportColumns: readonly string[];

  protected abstract fromRow(row: CsvRow, context: ImportContext): VaultRecord;
  protected abstract toRow(record: VaultRecord): Partial<CsvRow>;

  importRow(row: CsvRow, context: ImportContext = LOGGING_CONTEXT): VaultRecord {
    const canonical = this.canonicalizeRow(row);
    const missing = this.headerFingerprint.required.filter(column => !(column in canonical));
    if (missing.length > 0) {
      throw new MissingRequiredColumnError(this.providerId, missing);
    }
    return this.fromRow(canonical, context);
  }

  /**
   * Re-key columns whose header differs from a known column only in case,
   * spacing, quoting or punctuation (the same comparison detection uses).
   * Unrecognised columns keep their original names.
   */
  protected canonicalizeRow(row: CsvRow): CsvRow {
    const known = new Map<string, string>();
    for (const column of [...this.headerFingerprint.required, ...this.headerFingerprint.optional, ...this.exportColumns]) {
      const key = normalizeHeader(column);
      if (!known.has(key)) known.set(key, column);
    }

    const result: CsvRow = {};
    for (const [column, value] of Object.entries(row)) {
      const target = known.get(normalizeHeader(column));
      if (target !== undefined && target !== column && !(target in row) && !(target in result)) {
        result[target] = value;
      } else {
        result[column] = value;
      }
    }
    return result;
  }

  exportRow(record: VaultRecord): CsvRow {
    const values = this.toRow(record);
    const row: CsvRow = {};
    for (const column of this.exportColumns) {
      row[column] = values[column] ?? '';
    }
    return row;
  }

  /** Copy every column not in `mapped` into `extra` under its original name. */
  protected collectExtra(row: CsvRow, mapped: Iterable<string>): Record<string, string> {
    const known = new Set(mapped);
    const extra: Record<string, string> = {};
    for (const [column, value] of Object.entries(row)) {
      if (!known.has(column)) extra[column] = value;
    }
    return extra;
  }

  /** Export values for columns this format keeps in `extra`. */
  protected extraColumns(record: VaultRecord, columns: readonly string[]): Partial<CsvRow> {
    const values: Partial<CsvRow> = {};
    for (const column of columns) {
      values[column] = record.extra[column] ?? '';
    }
    return values;
  }

  protected rawKey(column: string): string {
    return `${this.providerId}.${column}`;
  }

  /**
   * Write back the raw value a lossy column was imported from, as long as it
   * still decodes to the record's current value; otherwise use `encoded`.
   */
  protected restoreRaw<T>(
    record: VaultRecord,
    column: string,
    current: T,
    decode: (raw: string) => T,
    encoded: string,
  ): string {
    const raw = record.extra[this.rawKey(column)];
    if (raw !== undefined && decode(raw) === current) return raw;
    return encoded;
  }

  /** Parse a timestamp column; an unparsable value becomes unknown and is reported. */
  protected readTimestamp(row: CsvRow, column: string, context: ImportContext): number | undefined {
    const raw = row[column];
    const parsed = parseTimestamp(raw);
    if (parsed === undefined && raw !== undefined && raw.trim() !== '') {
      context.warn({ kind: 'unparsable-timestamp', provider: this.providerId, column, value: raw });
    }
    return parsed;
  }

  protected splitTotp(raw: string | undefined): { totpUri?: string; totpSecret?: string } {
    const value = raw ?? '';
    if (!value) return {};
    if (value.toLowerCase().startsWith('otpauth://')) return { totpUri: value };
    return { totpSecret: value };
  }

  protected joinTotp(record: VaultRecord): string {
    return record.totpUri ?? record.totpSecret ?? '';
  }

  /**
   * Title to write for a record. Records from other providers with no title
   * fall back to their URL so title-keyed formats stay readable.
   */
  protected exportTitle(record: VaultRecord): string {
    if (record.title || record.source === this.providerId) return record.title;
    return record.primaryUrl ?? '';
  }

  protected flag(value: string | undefined, truthy: string = '1'): boolean {
    return (value ?? '').trim().toLowerCase() === truthy.toLowerCase();
  }
}
