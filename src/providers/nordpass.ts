import type { CsvRow, ImportContext, ItemType, VaultRecord } from '../types/index.js';
import { createRecord } from '../vault/model.js';
import { BaseProvider } from './base.js';

const MAPPED = ['name', 'url', 'username', 'password', 'note', 'folder', 'email'];

const CARD_COLUMNS = ['cardholdername', 'cardnumber', 'cvc', 'expirydate', 'zipcode'] as const;
const IDENTITY_COLUMNS = ['full_name', 'phone_number', 'address1', 'address2', 'city', 'country', 'state'] as const;

function inferItemType(row: CsvRow): ItemType {
  const filled = (column: string) => (row[column] ?? '').trim() !== '';
  if (filled('cardnumber') || filled('cardholdername')) return 'card';
  if (filled('full_name') || filled('address1') || filled('city')) return 'identity';
  return 'login';
}

/** NordPass CSV. Card and identity columns ride along in `extra`. */
export class NordPassProvider extends BaseProvider {
  readonly providerId = 'nordpass';
  readonly displayName = 'NordPass';
  readonly headerFingerprint = {
    required: ['name', 'url', 'username', 'password'],
    optional: ['note', ...CARD_COLUMNS, 'folder', 'email', ...IDENTITY_COLUMNS],
  };
  readonly exportColumns = [
    'name', 'url', 'username', 'password', 'note',
    'cardholdername', 'cardnumber', 'cvc', 'expirydate', 'zipcode',
    'folder', 'full_name', 'phone_number', 'email',
    'address1', 'address2', 'city', 'country', 'state',
  ] as const;

  protected fromRow(row: CsvRow, _context: ImportContext): VaultRecord {
    return createRecord({
      source: this.providerId,
      itemType: inferItemType(row),
      title: row.name,
      primaryUrl: row.url,
      username: row.username,
      email: row.email,
      password: row.password,
      notes: row.note,
      folder: row.folder,
      extra: this.collectExtra(row, MAPPED),
    });
  }

  protected toRow(record: VaultRecord): Partial<CsvRow> {
    return {
      ...this.extraColumns(record, [...CARD_COLUMNS, ...IDENTITY_COLUMNS]),
      name: this.exportTitle(record),
      url: record.primaryUrl ?? '',
      username: record.username,
      password: record.password,
      note: record.notes,
      folder: record.folder ?? '',
      email: record.email,
    };
  }
}
