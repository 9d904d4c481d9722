import type { CsvRow, ImportContext, VaultRecord } from '../types/index.js';
import { createRecord } from '../vault/model.js';
import { BaseProvider } from './base.js';

const MAPPED = ['Name', 'URL', 'MatchUrl', 'Login', 'Pwd', 'Note', 'Folder'];

/** RoboForm logins export. `MatchUrl` becomes the first secondary URL. */
export class RoboFormProvider extends BaseProvider {
  readonly providerId = 'roboform';
  readonly displayName = 'RoboForm';
  readonly headerFingerprint = {
    required: ['Name', 'URL', 'Login', 'Pwd'],
    optional: ['MatchUrl', 'Note', 'Folder', 'RfFieldsV2'],
  };
  readonly exportColumns = ['Name', 'URL', 'MatchUrl', 'Login', 'Pwd', 'Note', 'Folder', 'RfFieldsV2'] as const;

  protected fromRow(row: CsvRow, _context: ImportContext): VaultRecord {
    return createRecord({
      source: this.providerId,
      title: row.Name,
      primaryUrl: row.URL,
      secondaryUrls: row.MatchUrl ? [row.MatchUrl] : [],
      username: row.Login,
      password: row.Pwd,
      notes: row.Note,
      folder: row.Folder,
      extra: this.collectExtra(row, MAPPED),
    });
  }

  protected toRow(record: VaultRecord): Partial<CsvRow> {
    return {
      ...this.extraColumns(record, ['RfFieldsV2']),
      Name: this.exportTitle(record),
      URL: record.primaryUrl ?? '',
      MatchUrl: record.secondaryUrls[0] ?? '',
      Login: record.username || record.email,
      Pwd: record.password,
      Note: record.notes,
      Folder: record.folder ?? '',
    };
  }
}
