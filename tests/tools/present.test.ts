import { describe, it, expect } from 'vitest';
import { presentCluster, redactNotes } from '../../src/tools/present.js';
import { groupRecords } from '../../src/vault/grouping.js';
import { toReviewCluster } from '../../src/vault/resolve.js';
import { makeRecord } from '../helpers.js';

describe('redactNotes', () => {
  it('should hide password and TOTP lines only', () => {
    const notes = 'mine\n\nMerged from duplicates:\n- URLs: https://x.example\n- passwords: pw-2\n- TOTP secrets: JBSWY3DP';
    expect(redactNotes(notes)).toBe(
      'mine\n\nMerged from duplicates:\n- URLs: https://x.example\n- passwords: [redacted]\n- TOTP secrets: [redacted]',
    );
  });
});

describe('presentCluster', () => {
  it('should show password hints without the passwords', () => {
    const members = [
      makeRecord({ internalId: 'a', primaryUrl: 'x.example', username: 'me', password: 'pw-long', updatedAt: 2 }),
      makeRecord({ internalId: 'b', primaryUrl: 'x.example', username: 'me', password: 'pw', updatedAt: 1 }),
    ];
    const [cluster] = groupRecords(members, { strictPasswords: false });
    const view = presentCluster(toReviewCluster(cluster));

    expect(view.preferredId).toBe('a');
    expect(view.key).toEqual({ itemType: 'login', domainOrName: 'x.example', loginId: 'me' });
    expect(view.members.map(m => [m.id, m.preferred, m.samePasswordAsPreferred, m.passwordLength])).toEqual([
      ['a', true, true, 7],
      ['b', false, false, 2],
    ]);
    expect(view.members.map(m => m.updated)).toEqual(['1970-01-01 00:00 UTC', '1970-01-01 00:00 UTC']);
    expect(view.proposedNotes).toBe('Merged from duplicates:\n- passwords: [redacted]');
    expect(JSON.stringify(view)).not.toContain('pw-long');
  });
});
