import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DedupeSession } from '../session/index.js';
import { recordId } from '../vault/model.js';
import { errorMessage } from '../utils/index.js';
import { presentCluster } from './present.js';

export function registerDuplicatesTool(server: McpServer, session: DedupeSession): void {
  server.registerTool('find_duplicates', {
    description: 'Group the loaded records into duplicate clusters. Exact duplicates are removed automatically; '
      + 'the remaining clusters are returned for review. Passwords and TOTP values are redacted.',
    inputSchema: {
      strictPasswords: z.boolean().optional()
        .describe('Only group records whose passwords match (default from config)'),
      emailUsernameEquivalence: z.boolean().optional()
        .describe('Treat username and email as interchangeable login identifiers (default from config)'),
    },
  }, async ({ strictPasswords, emailUsernameEquivalence }) => {
    try {
      const result = session.findDuplicates({ strictPasswords, emailUsernameEquivalence });
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            stats: result.stats,
            removedExact: result.removed.map(r => ({
              clusterId: r.clusterId,
              keptId: recordId(r.kept),
              removedIds: r.removed.map(recordId),
            })),
            notices: result.notices,
            clusters: result.pending.map(presentCluster),
          }, null, 2),
        }],
      };
    } catch (err) {
      return {
        content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
        isError: true,
      };
    }
  });
}
