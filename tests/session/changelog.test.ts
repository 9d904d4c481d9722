import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ChangeLog, saveChangeLog, sha256 } from '../../src/session/changelog.js';
import { createTempDir } from '../helpers.js';

describe('ChangeLog', () => {
  it('should record entries with the injected clock', () => {
    const log = new ChangeLog(() => 42);
    log.recordExactRemoval('cluster-1', 'a', ['b']);
    log.recordMerge('cluster-2', 'c', ['d', 'e']);
    log.recordKeepAll('cluster-3', ['f', 'g']);
    log.recordSkip('cluster-4', ['h']);

    expect(log.entries).toEqual([
      { timestampMs: 42, action: 'remove-exact', details: { clusterId: 'cluster-1', keptId: 'a', removedIds: ['b'] } },
      { timestampMs: 42, action: 'merge', details: { clusterId: 'cluster-2', keptId: 'c', mergedFromIds: ['d', 'e'] } },
      { timestampMs: 42, action: 'keep-all', details: { clusterId: 'cluster-3', recordIds: ['f', 'g'] } },
      { timestampMs: 42, action: 'skip', details: { clusterId: 'cluster-4', recordIds: ['h'] } },
    ]);
  });

  it('should clear its entries', () => {
    const log = new ChangeLog(() => 1);
    log.recordSkip('cluster-1', []);
    log.clear();
    expect(log.entries).toEqual([]);
  });
});

describe('sha256', () => {
  it('should hash text', () => {
    expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('saveChangeLog', () => {
  let cleanup: (() => Promise<void>) | undefined;

  afterEach(async () => {
    await cleanup?.();
  });

  it('should write a JSON document with the input hash', async () => {
    const temp = await createTempDir();
    cleanup = temp.cleanup;
    const input = path.join(temp.dir, 'in.csv');
    const target = path.join(temp.dir, 'log.json');
    await fs.writeFile(input, 'abc');

    const log = new ChangeLog(() => 7);
    log.recordMerge('cluster-1', 'a', ['b']);
    const document = log.toDocument({
      inputFile: input,
      outputFile: 'out.csv',
      inputSha256: sha256(await fs.readFile(input)),
      outputSha256: '',
    });
    await saveChangeLog(target, document);

    const saved: unknown = JSON.parse(await fs.readFile(target, 'utf-8'));
    expect(saved).toEqual({
      inputFile: input,
      outputFile: 'out.csv',
      inputSha256: 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
      outputSha256: '',
      entries: [{ timestampMs: 7, action: 'merge', details: { clusterId: 'cluster-1', keptId: 'a', mergedFromIds: ['b'] } }],
    });
  });
});
