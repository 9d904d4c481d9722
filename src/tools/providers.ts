import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DedupeSession } from '../session/index.js';

export function registerProvidersTool(server: McpServer, session: DedupeSession): void {
  server.registerTool('list_providers', {
    description: 'List supported password-manager CSV formats with their required and exported columns.',
  }, async () => {
    const providers = session.providers();
    return {
      content: [{
        type: 'text' as const,
        text: JSON.stringify({ providers, count: providers.length }, null, 2),
      }],
    };
  });
}
