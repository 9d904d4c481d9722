import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DedupeSession } from '../session/index.js';
import { registerProvidersTool } from './providers.js';
import { registerDetectTool } from './detect.js';
import { registerImportTool } from './import.js';
import { registerDuplicatesTool } from './duplicates.js';
import { registerMergeTool } from './merge.js';
import { registerAutoResolveTool } from './auto-resolve.js';
import { registerSearchTool } from './search.js';
import { registerExportTool } from './export.js';

export function registerAllTools(server: McpServer, session: DedupeSession): void {
  registerProvidersTool(server, session);
  registerDetectTool(server, session);
  registerImportTool(server, session);
  registerDuplicatesTool(server, session);
  registerMergeTool(server, session);
  registerAutoResolveTool(server, session);
  registerSearchTool(server, session);
  registerExportTool(server, session);
}
