import type { CsvRow, ImportContext, VaultRecord } from '../types/index.js';
import { createRecord } from '../vault/model.js';
import { BaseProvider } from './base.js';

const MAPPED = ['url', 'username', 'password', 'guid', 'timeCreated', 'timePasswordChanged'];
const PASSTHROUGH = ['httpRealm', 'formActionOrigin', 'timeLastUsed'] as const;

/** Firefox about:logins export. Timestamps are epoch milliseconds. */
export class FirefoxProvider extends BaseProvider {
  readonly providerId = 'firefox';
  readonly displayName = 'Firefox';
  readonly headerFingerprint = {
    required: ['url', 'username', 'password'],
    optional: ['httpRealm', 'formActionOrigin', 'guid', 'timeCreated', 'timeLastUsed', 'timePasswordChanged'],
  };
  readonly exportColumns = [
    'url', 'username', 'password', 'httpRealm', 'formActionOrigin',
    'guid', 'timeCreated', 'timeLastUsed', 'timePasswordChanged',
  ] as const;

  protected fromRow(row: CsvRow, context: ImportContext): VaultRecord {
    return createRecord({
      source: this.providerId,
      sourceId: row.guid || undefined,
      primaryUrl: row.url,
      username: row.username,
      password: row.password,
      createdAt: this.readTimestamp(row, 'timeCreated', context),
      updatedAt: this.readTimestamp(row, 'timePasswordChanged', context),
      extra: this.collectExtra(row, MAPPED),
    });
  }

  protected toRow(record: VaultRecord): Partial<CsvRow> {
    return {
      ...this.extraColumns(record, PASSTHROUGH),
      url: record.primaryUrl ?? '',
      username: record.username || record.email,
      password: record.password,
      guid: record.source === this.providerId ? record.sourceId ?? '' : '',
      timeCreated: record.createdAt === undefined ? '' : String(record.createdAt),
      timePasswordChanged: record.updatedAt === undefined ? '' : String(record.updatedAt),
    };
  }
}
