import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DedupeSession } from '../session/index.js';
import { errorMessage } from '../utils/index.js';

export function registerAutoResolveTool(server: McpServer, session: DedupeSession): void {
  server.registerTool('auto_resolve', {
    description: 'Resolve every undecided cluster by keeping its preferred record (most recently updated, '
      + 'then most complete) with the other members folded into its notes.',
  }, async () => {
    try {
      const resolved = session.autoResolve();
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            resolved: resolved.length,
            clusterIds: resolved,
            message: `Kept the preferred record in ${resolved.length} clusters`,
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
