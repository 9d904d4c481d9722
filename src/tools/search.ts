import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DedupeSession } from '../session/index.js';
import { errorMessage } from '../utils/index.js';

export function registerSearchTool(server: McpServer, session: DedupeSession): void {
  server.registerTool('search_records', {
    description: 'Fuzzy search the loaded records by title, URL, username, email or folder. '
      + 'Returns redacted summaries; pendingClusterId names the undecided cluster a record belongs to.',
    inputSchema: {
      query: z.string().describe('Search query'),
      limit: z.number().int().positive().optional().default(20).describe('Maximum results to return'),
    },
  }, async ({ query, limit }) => {
    try {
      const results = session.search(query, limit);
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify(results, null, 2),
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
