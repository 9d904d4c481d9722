import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Decision, DecisionKind } from '../types/index.js';
import type { DedupeSession } from '../session/index.js';
import { recordId } from '../vault/model.js';
import { DecisionError, errorMessage } from '../utils/index.js';
import { redactNotes } from './present.js';

const DECISION_KINDS = ['keep-one', 'keep-best', 'keep-all', 'skip'] as const satisfies readonly DecisionKind[];

function toDecision(session: DedupeSession, clusterId: string, kind: DecisionKind, member: string | undefined): Decision {
  if (kind === 'keep-one') {
    if (!member) throw new DecisionError('keep-one needs the recordId of the member to keep');
    return { kind, recordId: session.memberId(clusterId, member) };
  }
  return { kind };
}

export function registerMergeTool(server: McpServer, session: DedupeSession): void {
  server.registerTool('resolve_cluster', {
    description: 'Decide a duplicate cluster: keep one member (others folded into its notes), keep the '
      + 'preferred member, keep all members, or skip.',
    inputSchema: {
      clusterId: z.string().describe('Cluster id from find_duplicates'),
      decision: z.enum(DECISION_KINDS).describe('keep-one | keep-best | keep-all | skip'),
      recordId: z.string().optional().describe(
        'Member to keep when decision is keep-one: its recordId, or a title, URL, username or email that picks it out',
      ),
    },
  }, async ({ clusterId, decision, recordId: keepId }) => {
    try {
      const outcome = session.resolve(clusterId, toDecision(session, clusterId, decision, keepId));
      const [kept] = outcome.records;
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            clusterId,
            decision,
            keptIds: outcome.records.map(recordId),
            discardedIds: outcome.discarded.map(recordId),
            mergedNotes: outcome.discarded.length > 0 && kept ? redactNotes(kept.notes) : undefined,
            remaining: session.pendingClusters().length,
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
