import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { DEFAULT_CONFIG } from '../../src/config.js';
import { createServer } from '../../src/server.js';
import { parseCsv } from '../../src/vault/csv.js';
import { createTempDir } from '../helpers.js';
import { MERGED_WEBMAIL_NOTES, PROTON_CSV } from '../session/fixtures.js';

let client: Client;
let dir: string;
let cleanup: () => Promise<void>;
let input: string;

async function call(name: string, args: Record<string, unknown> = {}): Promise<{ text: string; isError: boolean }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (!first || first.type !== 'text') throw new Error(`${name} returned no text content`);
  return { text: first.text, isError: result.isError ?? false };
}

async function callJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const { text, isError } = await call(name, args);
  if (isError) throw new Error(text);
  return JSON.parse(text);
}

async function readResource(uri: string): Promise<unknown> {
  const result = await client.readResource({ uri });
  const [first] = result.contents;
  if (!first || !('text' in first) || typeof first.text !== 'string') throw new Error(`${uri} returned no text`);
  return JSON.parse(first.text);
}

beforeEach(async () => {
  ({ dir, cleanup } = await createTempDir());
  input = path.join(dir, 'proton.csv');
  await fs.writeFile(input, PROTON_CSV);

  const { server } = createServer(DEFAULT_CONFIG);
  client = new Client({ name: 'test-client', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterEach(async () => {
  await client.close();
  await cleanup();
});

describe('MCP server', () => {
  it('should list all tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map(t => t.name).sort()).toEqual([
      'auto_resolve',
      'detect_format',
      'export_csv',
      'find_duplicates',
      'import_csv',
      'list_providers',
      'resolve_cluster',
      'search_records',
    ]);
  });

  it('should list providers', async () => {
    const result = await callJson('list_providers');
    expect(result).toMatchObject({ count: 10 });
  });

  it('should detect a file format', async () => {
    const result = await callJson('detect_format', { filePath: input });
    expect(result).toMatchObject({ status: 'matched', providerId: 'protonpass', confidence: 1 });
  });

  it('should report errors as tool errors', async () => {
    const result = await call('find_duplicates');
    expect(result).toEqual({ text: 'Error: No file loaded; call import_csv first', isError: true });
  });

  it('should import, review, resolve and export', async () => {
    expect(await callJson('import_csv', { filePath: input })).toMatchObject({ providerId: 'protonpass', imported: 5 });

    const scan = await call('find_duplicates');
    expect(scan.isError).toBe(false);
    expect(scan.text).not.toContain('pw-1');
    expect(scan.text).not.toContain('pw-2');
    expect(JSON.parse(scan.text)).toMatchObject({
      stats: { exactDuplicatesRemoved: 1, pendingClusters: 1 },
      clusters: [{ id: 'cluster-2', key: { domainOrName: 'mail.example', loginId: 'me@mail.example' } }],
    });

    const blocked = await call('export_csv', { outputPath: path.join(dir, 'out.csv') });
    expect(blocked).toEqual({ text: 'Error: 1 cluster(s) still need a decision: cluster-2', isError: true });

    const missingId = await call('resolve_cluster', { clusterId: 'cluster-2', decision: 'keep-one' });
    expect(missingId).toEqual({ text: 'Error: keep-one needs the recordId of the member to keep', isError: true });

    expect(await readResource('vault://clusters')).toHaveLength(1);
    expect(await callJson('auto_resolve')).toMatchObject({ resolved: 1, clusterIds: ['cluster-2'] });
    expect(await readResource('vault://clusters')).toEqual([]);

    const output = path.join(dir, 'out.csv');
    expect(await callJson('export_csv', { outputPath: output, provider: 'lastpass' })).toMatchObject({
      providerId: 'lastpass',
      exported: 3,
    });
    const { rows } = parseCsv(await fs.readFile(output, 'utf-8'));
    expect(rows.map(r => r.name)).toEqual(['Example', 'Bank', 'Webmail']);

    expect(await readResource('vault://changelog')).toMatchObject({
      inputFile: input,
      entries: [{ action: 'remove-exact' }, { action: 'merge' }],
    });
  });

  it('should keep a cluster member named by title', async () => {
    await callJson('import_csv', { filePath: input });
    await callJson('find_duplicates');

    const hits = await callJson('search_records', { query: 'webmail' });
    expect(Array.isArray(hits) && hits[0]).toMatchObject({ title: 'Webmail', pendingClusterId: 'cluster-2' });

    const outcome = await callJson('resolve_cluster', { clusterId: 'cluster-2', decision: 'keep-one', recordId: 'Webmail' });
    expect(outcome).toMatchObject({ clusterId: 'cluster-2', decision: 'keep-one', mergedNotes: MERGED_WEBMAIL_NOTES, remaining: 0 });

    const unmatched = await call('resolve_cluster', { clusterId: 'cluster-2', decision: 'keep-one', recordId: 'qqqqqq' });
    expect(unmatched).toEqual({ text: 'Error: No member matches "qqqqqq"', isError: true });
  });

  it('should search loaded records', async () => {
    await callJson('import_csv', { filePath: input, provider: 'protonpass' });
    const results = await callJson('search_records', { query: 'bank', limit: 5 });
    expect(Array.isArray(results) && results[0]).toMatchObject({ title: 'Bank', passwordLength: 4 });
  });
});
