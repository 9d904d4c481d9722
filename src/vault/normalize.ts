import type { VaultRecord } from '../types/index.js';

const SCHEME_RE = /^[a-z][a-z0-9+.-]*:\/\//i;

/** Lower-cased URL with `https://` prepended when no scheme is present. */
export function normalizeUrl(raw: string | undefined): string {
  const trimmed = (raw ?? '').trim();
  if (!trimmed) return '';
  const withScheme = SCHEME_RE.test(trimmed) || trimmed.startsWith('//')
    ? trimmed
    : `https://${trimmed}`;
  const absolute = withScheme.startsWith('//') ? `https:${withScheme}` : withScheme;
  try {
    return new URL(absolute).href.toLowerCase();
  } catch {
    return absolute.toLowerCase();
  }
}

/** Host of a URL, lower-cased, with a single leading "www." removed. */
export function normalizeDomain(raw: string | undefined): string {
  const url = normalizeUrl(raw);
  if (!url) return '';
  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    return '';
  }
  return host.startsWith('www.') ? host.slice(4) : host;
}

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Normalize a login identifier (lowercase, trim). */
export function normalizeLogin(value: string): string {
  return value.trim().toLowerCase();
}

/** Site identity: the record's domain, or its normalized title when it has no usable URL. */
export function domainOrName(record: VaultRecord): string {
  return normalizeDomain(record.primaryUrl) || normalizeTitle(record.title);
}

/**
 * Primary login identifier: the username, falling back to the email
 * when username/email equivalence is on.
 */
export function loginId(record: VaultRecord, equivalenceEnabled: boolean = true): string {
  const username = normalizeLogin(record.username);
  if (username || !equivalenceEnabled) return username;
  return normalizeLogin(record.email);
}

/** Every identifier a record can be matched on. Empty when it has none. */
export function loginIdentifiers(record: VaultRecord, equivalenceEnabled: boolean = true): string[] {
  const ids: string[] = [];
  const username = normalizeLogin(record.username);
  if (username) ids.push(username);
  if (equivalenceEnabled) {
    const email = normalizeLogin(record.email);
    if (email && email !== username) ids.push(email);
  }
  return ids;
}
