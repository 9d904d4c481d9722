import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { AUTO_PROVIDER, type DedupeSession } from '../session/index.js';
import { errorMessage } from '../utils/index.js';

export function registerImportTool(server: McpServer, session: DedupeSession): void {
  server.registerTool('import_csv', {
    description: 'Load a password-manager CSV export into the session. Replaces any previously loaded file.',
    inputSchema: {
      filePath: z.string().describe('Path to the CSV file to import'),
      provider: z.string().optional().default(AUTO_PROVIDER)
        .describe('Provider id (see list_providers), or "auto" to detect from the header row'),
    },
  }, async ({ filePath, provider }) => {
    try {
      const summary = await session.load(filePath, provider);
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            ...summary,
            message: `Imported ${summary.imported} records from ${filePath} as ${summary.providerId}`,
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
