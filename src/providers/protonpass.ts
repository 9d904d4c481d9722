import type { CsvRow, ImportContext, ItemType, VaultRecord } from '../types/index.js';
import { ITEM_TYPES } from '../types/index.js';
import { createRecord } from '../vault/model.js';
import { BaseProvider } from './base.js';

const IMPORT_COLUMNS = [
  'type', 'name', 'url', 'email', 'username', 'password',
  'note', 'totp', 'createTime', 'modifyTime', 'vault',
] as const;

function toItemType(raw: string | undefined): ItemType {
  const key = (raw ?? '').trim().toLowerCase();
  return ITEM_TYPES.find(t => t === key) ?? 'other';
}

/**
 * Proton Pass CSV. Export drops `type`, `createTime` and `modifyTime`; they
 * only feed grouping and preferred-record selection.
 */
export class ProtonPassProvider extends BaseProvider {
  readonly providerId = 'protonpass';
  readonly displayName = 'Proton Pass';
  readonly headerFingerprint = { required: IMPORT_COLUMNS, optional: [] };
  readonly exportColumns = ['name', 'url', 'email', 'username', 'password', 'note', 'totp', 'vault'] as const;

  protected fromRow(row: CsvRow, context: ImportContext): VaultRecord {
    return createRecord({
      source: this.providerId,
      itemType: toItemType(row.type),
      title: row.name,
      primaryUrl: row.url,
      email: row.email,
      username: row.username,
      password: row.password,
      notes: row.note,
      ...this.splitTotp(row.totp),
      createdAt: this.readTimestamp(row, 'createTime', context),
      updatedAt: this.readTimestamp(row, 'modifyTime', context),
      folder: row.vault,
      extra: this.collectExtra(row, IMPORT_COLUMNS),
    });
  }

  protected toRow(record: VaultRecord): Partial<CsvRow> {
    return {
      name: this.exportTitle(record),
      url: record.primaryUrl ?? '',
      email: record.email,
      username: record.username,
      password: record.password,
      note: record.notes,
      totp: this.joinTotp(record),
      vault: record.folder ?? '',
    };
  }
}
