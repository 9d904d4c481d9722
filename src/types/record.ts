export const ITEM_TYPES = ['login', 'note', 'card', 'identity', 'other'] as const;

export type ItemType = typeof ITEM_TYPES[number];

/** One CSV row keyed by column name. */
export type CsvRow = Record<string, string>;

/** Provider-agnostic representation of one credential entry. */
export interface VaultRecord {
  itemType: ItemType;
  source: string;
  sourceId?: string;
  internalId?: string;

  title: string;
  username: string;
  /** Email-bearing login field, kept apart from `username` where a format has both. */
  email: string;
  password: string;

  primaryUrl?: string;
  secondaryUrls: string[];

  notes: string;

  folder?: string;
  tags: string[];
  favorite: boolean;

  totpUri?: string;
  totpSecret?: string;

  /** Epoch milliseconds. */
  createdAt?: number;
  /** Epoch milliseconds. */
  updatedAt?: number;

  /** Provider-specific columns with no canonical home. */
  extra: Record<string, string>;
}

/** Display-safe view of a record: no password, TOTP or notes content. */
export interface RecordSummary {
  id: string;
  itemType: ItemType;
  source: string;
  title: string;
  username: string;
  email: string;
  url?: string;
  folder?: string;
  passwordLength: number;
  hasTotp: boolean;
  hasNotes: boolean;
  updatedAt?: number;
}

export function toSummary(record: VaultRecord): RecordSummary {
  return {
    id: record.internalId ?? '',
    itemType: record.itemType,
    source: record.source,
    title: record.title,
    username: record.username,
    email: record.email,
    url: record.primaryUrl,
    folder: record.folder,
    passwordLength: record.password.length,
    hasTotp: Boolean(record.totpUri || record.totpSecret),
    hasNotes: record.notes.trim().length > 0,
    updatedAt: record.updatedAt,
  };
}
