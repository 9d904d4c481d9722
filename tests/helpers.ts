import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { CsvRow, VaultRecord } from '../src/types/index.js';
import { createRecord } from '../src/vault/model.js';

/** Create a temp directory for file-based tests. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vault-dedupe-test-'));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

/** Build a login record with a fixed id for testing. */
export function makeRecord(overrides: Partial<VaultRecord> & { internalId: string }): VaultRecord {
  return createRecord({ source: 'protonpass', ...overrides });
}

/** A complete Proton Pass row; every column present. */
export function protonRow(overrides: Partial<CsvRow> = {}): CsvRow {
  return {
    type: 'login',
    name: '',
    url: '',
    email: '',
    username: '',
    password: '',
    note: '',
    totp: '',
    createTime: '',
    modifyTime: '',
    vault: 'Personal',
    ...overrides,
  };
}
