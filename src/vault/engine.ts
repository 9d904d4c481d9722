import type {
  CsvRow,
  Decision,
  DecisionOutcome,
  DetectionResult,
  DuplicateCluster,
  GroupNotice,
  GroupResult,
  GroupingOptions,
  ImportWarning,
  VaultRecord,
} from '../types/index.js';
import type { ProviderRegistry } from '../providers/registry.js';
import { MissingRequiredColumnError, createLogger } from '../utils/index.js';
import { type DetectOptions, detect as detectFormat } from './detect.js';
import { groupRecords } from './grouping.js';
import { applyDecision as applyClusterDecision, resolveClusters } from './resolve.js';

const log = createLogger('engine');

export interface ImportReport {
  records: VaultRecord[];
  errors: MissingRequiredColumnError[];
  warnings: ImportWarning[];
}

export function detect(
  registry: ProviderRegistry,
  headers: readonly string[],
  options: DetectOptions = {},
): DetectionResult {
  const result = detectFormat(registry, headers, options);
  log.debug(`detect: ${result.status} ${result.providerId} (${result.confidence.toFixed(2)})`);
  return result;
}

/** Import every row, collecting per-row failures instead of stopping. Row indices are 1-based. */
export function importAllSettled(
  registry: ProviderRegistry,
  providerId: string,
  rows: readonly CsvRow[],
): ImportReport {
  const plugin = registry.get(providerId);
  const report: ImportReport = { records: [], errors: [], warnings: [] };

  rows.forEach((row, i) => {
    const rowIndex = i + 1;
    try {
      report.records.push(plugin.importRow(row, {
        warn: warning => report.warnings.push({ ...warning, rowIndex }),
      }));
    } catch (err) {
      if (err instanceof MissingRequiredColumnError) {
        report.errors.push(err.atRow(rowIndex));
        return;
      }
      throw err;
    }
  });

  for (const warning of report.warnings) {
    log.warn(`UnparsableTimestamp: ${providerId} row ${warning.rowIndex} column "${warning.column}" treated as unknown`);
  }
  return report;
}

/**
 * Import every row with one provider. Every row is attempted; the first
 * missing-column failure is then thrown with its row index.
 */
export function importAll(
  registry: ProviderRegistry,
  providerId: string,
  rows: readonly CsvRow[],
): VaultRecord[] {
  const report = importAllSettled(registry, providerId, rows);
  const [first] = report.errors;
  if (first) throw first;
  return report.records;
}

/**
 * Cluster records and settle what needs no human judgement. Singletons and
 * exact-duplicate survivors land in `autoResolved`; the rest await a decision.
 */
export function group(records: readonly VaultRecord[], options: GroupingOptions = {}): GroupResult {
  const clusters = groupRecords(records, options);
  const { autoResolved, pending, removed } = resolveClusters(clusters);
  const notices = clusters.filter(c => c.riskyMergeAvoided).map(riskyNotice);

  const exactDuplicatesRemoved = removed.reduce((n, r) => n + r.removed.length, 0);
  log.info(
    `Grouped ${records.length} records into ${clusters.length} clusters; `
    + `${exactDuplicatesRemoved} exact duplicates removed, ${pending.length} clusters need review`,
  );

  return {
    autoResolved,
    pending,
    removed,
    notices,
    stats: {
      inputCount: records.length,
      clusterCount: clusters.length,
      exactDuplicatesRemoved,
      pendingClusters: pending.length,
      ungrouped: notices.length,
    },
  };
}

export function applyDecision(
  cluster: Pick<DuplicateCluster, 'id' | 'members'>,
  decision: Decision,
): DecisionOutcome {
  return applyClusterDecision(cluster, decision);
}

export function exportAll(
  registry: ProviderRegistry,
  providerId: string,
  records: readonly VaultRecord[],
): CsvRow[] {
  const plugin = registry.get(providerId);
  return records.map(record => plugin.exportRow(record));
}

function riskyNotice(cluster: DuplicateCluster): GroupNotice {
  const id = cluster.members[0]?.internalId ?? '';
  return {
    kind: 'risky-merge-avoided',
    recordId: id,
    message: `Record ${id} has no site identity and no login id; kept out of duplicate matching`,
  };
}
