import { describe, it, expect } from 'vitest';
import { createDefaultRegistry } from '../../src/providers/index.js';
import type { CsvRow } from '../../src/types/index.js';

const registry = createDefaultRegistry({ freeze: true });

/** One valid row per provider, every exported column filled where the format allows. */
const SAMPLES: Record<string, CsvRow> = {
  protonpass: {
    type: 'login',
    name: 'Example',
    url: 'https://example.com',
    email: 'me@example.com',
    username: 'me',
    password: 'test-secret',
    note: 'hello',
    totp: 'otpauth://totp/Example?secret=JBSWY3DP',
    createTime: '1700000000',
    modifyTime: '1700000100',
    vault: 'Personal',
  },
  bitwarden: {
    folder: 'Work',
    favorite: '1',
    type: 'login',
    name: 'Example',
    notes: 'multi\nline',
    fields: 'pin: 1234',
    reprompt: '0',
    login_uri: 'https://example.com,https://login.example.com',
    login_username: 'me',
    login_password: 'test-secret',
    login_totp: 'JBSWY3DP',
  },
  lastpass: {
    url: 'https://example.com',
    username: 'me',
    password: 'test-secret',
    totp: 'JBSWY3DP',
    extra: 'note text',
    name: 'Example',
    grouping: 'Work',
    fav: '0',
  },
  chromium: {
    name: 'example.com',
    url: 'https://example.com/',
    username: 'me',
    password: 'test-secret',
    note: '',
  },
  firefox: {
    url: 'https://example.com',
    username: 'me',
    password: 'test-secret',
    httpRealm: '',
    formActionOrigin: 'https://example.com',
    guid: '{0f9c4a52-test}',
    timeCreated: '1700000000000',
    timeLastUsed: '1700000500000',
    timePasswordChanged: '1700000100000',
  },
  dashlane: {
    Type: 'Login',
    Name: 'Example',
    'Website URL': 'https://example.com',
    Username: 'me',
    Email: 'me@example.com',
    'Secondary Login': 'alt',
    Password: 'test-secret',
    Comment: 'comment',
    collections: 'Work',
  },
  nordpass: {
    name: 'Example',
    url: 'https://example.com',
    username: 'me',
    password: 'test-secret',
    note: 'note',
    cardholdername: '',
    cardnumber: '',
    cvc: '',
    expirydate: '',
    zipcode: '',
    folder: 'Work',
    full_name: '',
    phone_number: '',
    email: 'me@example.com',
    address1: '',
    address2: '',
    city: '',
    country: '',
    state: '',
  },
  roboform: {
    Name: 'Example',
    URL: 'https://example.com',
    MatchUrl: 'https://example.com/login',
    Login: 'me',
    Pwd: 'test-secret',
    Note: 'note',
    Folder: '/Work',
    RfFieldsV2: 'pin$1234',
  },
  'apple-passwords': {
    Title: 'Example',
    URL: 'https://example.com',
    Username: 'me',
    Password: 'test-secret',
    Notes: 'note',
    OTPAuth: 'otpauth://totp/Example?secret=JBSWY3DP',
  },
  kaspersky: {
    Account: 'Example',
    Login: 'me',
    Password: 'test-secret',
    Url: 'https://example.com',
  },
};

function restrict(row: CsvRow, columns: readonly string[]): CsvRow {
  const out: CsvRow = {};
  for (const column of columns) out[column] = row[column] ?? '';
  return out;
}

describe('provider round trip', () => {
  it('should have a sample for every registered provider', () => {
    expect(Object.keys(SAMPLES).sort()).toEqual(registry.list().sort());
  });

  for (const plugin of registry.plugins()) {
    it(`should reproduce a ${plugin.providerId} row`, () => {
      const row = SAMPLES[plugin.providerId];
      const exported = plugin.exportRow(plugin.importRow(row));
      expect(exported).toEqual(restrict(row, plugin.exportColumns));
      expect(Object.keys(exported)).toEqual([...plugin.exportColumns]);
    });
  }
});

describe('bitwarden login_uri round trip', () => {
  const plugin = registry.get('bitwarden');

  for (const loginUri of ['https://a.example, https://b.example', 'https://x.example/?q=a,b']) {
    it(`should write back ${JSON.stringify(loginUri)} unchanged`, () => {
      const row = { ...SAMPLES.bitwarden, login_uri: loginUri };
      expect(plugin.exportRow(plugin.importRow(row)).login_uri).toBe(loginUri);
    });
  }
});
