import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DedupeSession } from '../session/index.js';
import { errorMessage } from '../utils/index.js';

export function registerDetectTool(server: McpServer, session: DedupeSession): void {
  server.registerTool('detect_format', {
    description: 'Identify which password manager produced a CSV export from its header row.',
    inputSchema: {
      filePath: z.string().describe('Path to the CSV file'),
    },
  }, async ({ filePath }) => {
    try {
      const detection = await session.detectFile(filePath);
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify(detection, null, 2),
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
