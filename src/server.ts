import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createDefaultRegistry } from './providers/index.js';
import { DedupeSession } from './session/index.js';
import { registerAllTools } from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import type { AppConfig } from './config.js';
import { logger } from './utils/index.js';

export function createServer(config: AppConfig): { server: McpServer; session: DedupeSession } {
  const server = new McpServer({
    name: 'vault-dedupe',
    version: '0.1.0',
  });

  const registry = createDefaultRegistry({ freeze: true });
  const session = new DedupeSession(registry, config);

  registerAllTools(server, session);
  registerAllResources(server, session);

  logger.info(`MCP server created with ${registry.list().length} providers`);

  return { server, session };
}
