import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DedupeSession } from '../session/index.js';
import { presentCluster } from '../tools/present.js';

export function registerAllResources(server: McpServer, session: DedupeSession): void {
  // vault://providers - supported CSV formats
  server.registerResource('providers', 'vault://providers', {
    title: 'Supported Providers',
    description: 'Password-manager CSV formats this server can read and write',
    mimeType: 'application/json',
  }, async (uri) => ({
    contents: [{
      uri: uri.href,
      text: JSON.stringify(session.providers(), null, 2),
      mimeType: 'application/json',
    }],
  }));

  // vault://clusters - clusters still awaiting a decision
  server.registerResource('clusters', 'vault://clusters', {
    title: 'Undecided Clusters',
    description: 'Duplicate clusters from the last scan that still need a decision (secrets redacted)',
    mimeType: 'application/json',
  }, async (uri) => {
    const clusters = session.groupResult ? session.pendingClusters().map(presentCluster) : [];
    return {
      contents: [{
        uri: uri.href,
        text: JSON.stringify(clusters, null, 2),
        mimeType: 'application/json',
      }],
    };
  });

  // vault://changelog - decisions taken so far
  server.registerResource('changelog', 'vault://changelog', {
    title: 'Change Log',
    description: 'Exact-duplicate removals and cluster decisions for the loaded file',
    mimeType: 'application/json',
  }, async (uri) => {
    const document = session.loadedFile ? session.changeLogDocument() : null;
    return {
      contents: [{
        uri: uri.href,
        text: JSON.stringify(document, null, 2),
        mimeType: 'application/json',
      }],
    };
  });
}
