import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DedupeSession } from '../session/index.js';
import { errorMessage } from '../utils/index.js';

export function registerExportTool(server: McpServer, session: DedupeSession): void {
  server.registerTool('export_csv', {
    description: 'Write the deduplicated records as CSV in any supported provider format. Refuses while '
      + 'clusters are undecided unless keepUndecided is set.',
    inputSchema: {
      outputPath: z.string().describe('File path to write to'),
      provider: z.string().optional().describe('Target provider id (defaults to the imported format)'),
      keepUndecided: z.boolean().optional().default(false)
        .describe('Write every member of undecided clusters unchanged'),
      changelogPath: z.string().optional().describe('Also write a JSON change log to this path'),
    },
  }, async ({ outputPath, provider, keepUndecided, changelogPath }) => {
    try {
      const summary = await session.export(outputPath, { provider, keepUndecided, changelogPath });
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            ...summary,
            message: `Exported ${summary.exported} records to ${outputPath}`,
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
