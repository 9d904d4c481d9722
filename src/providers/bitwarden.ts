import type { CsvRow, ImportContext, ItemType, VaultRecord } from '../types/index.js';
import { createRecord } from '../vault/model.js';
import { BaseProvider } from './base.js';

const TYPE_NAMES: Record<string, ItemType> = {
  login: 'login',
  note: 'note',
  card: 'card',
  identity: 'identity',
};

const MAPPED = [
  'folder', 'favorite', 'type', 'name', 'notes',
  'login_uri', 'login_username', 'login_password', 'login_totp',
];

/** Columns Bitwarden exports that have no canonical field. */
const PASSTHROUGH = ['fields', 'reprompt'] as const;

/** A comma starts a new URI only when a scheme or a host name follows it. */
const URI_SEPARATOR_RE = /,\s*(?=[a-z][a-z0-9+.-]*:\/\/|(?:[a-z0-9-]+\.)+[a-z]{2,}(?:[/:?#,]|$))/i;

function splitUris(raw: string | undefined): string[] {
  return (raw ?? '').split(URI_SEPARATOR_RE).map(u => u.trim()).filter(Boolean);
}

function toItemType(raw: string): ItemType {
  return TYPE_NAMES[raw.trim().toLowerCase()] ?? 'other';
}

/** Bitwarden individual vault CSV. `login_uri` holds comma-joined URIs. */
export class BitwardenProvider extends BaseProvider {
  readonly providerId = 'bitwarden';
  readonly displayName = 'Bitwarden';
  readonly headerFingerprint = {
    required: ['type', 'name'],
    optional: ['folder', 'favorite', 'notes', 'fields', 'reprompt', 'login_uri', 'login_username', 'login_password', 'login_totp'],
  };
  readonly exportColumns = [
    'folder', 'favorite', 'type', 'name', 'notes', 'fields', 'reprompt',
    'login_uri', 'login_username', 'login_password', 'login_totp',
  ] as const;

  protected fromRow(row: CsvRow, _context: ImportContext): VaultRecord {
    const uris = splitUris(row.login_uri);
    const extra = this.collectExtra(row, MAPPED);
    extra[this.rawKey('type')] = row.type;
    if (row.login_uri !== undefined) extra[this.rawKey('login_uri')] = row.login_uri;
    if (row.favorite !== undefined) extra[this.rawKey('favorite')] = row.favorite;

    return createRecord({
      source: this.providerId,
      itemType: toItemType(row.type),
      title: row.name,
      folder: row.folder,
      favorite: this.flag(row.favorite),
      notes: row.notes,
      primaryUrl: uris[0],
      secondaryUrls: uris.slice(1),
      username: row.login_username,
      password: row.login_password,
      ...this.splitTotp(row.login_totp),
      extra,
    });
  }

  protected toRow(record: VaultRecord): Partial<CsvRow> {
    const uris = (record.primaryUrl ? [record.primaryUrl, ...record.secondaryUrls] : record.secondaryUrls).join(',');
    const typeName = record.itemType === 'other' ? 'login' : record.itemType;
    return {
      ...this.extraColumns(record, PASSTHROUGH),
      folder: record.folder ?? '',
      favorite: this.restoreRaw(record, 'favorite', record.favorite, raw => this.flag(raw), record.favorite ? '1' : ''),
      type: this.restoreRaw(record, 'type', record.itemType, toItemType, typeName),
      name: this.exportTitle(record),
      notes: record.notes,
      login_uri: this.restoreRaw(record, 'login_uri', uris, raw => splitUris(raw).join(','), uris),
      login_username: record.username || record.email,
      login_password: record.password,
      login_totp: this.joinTotp(record),
    };
  }
}
