import * as fs from 'node:fs/promises';
import type {
  Decision,
  DecisionOutcome,
  DetectionResult,
  GroupResult,
  GroupingOptions,
  ImportWarning,
  ProviderInfo,
  RecordSummary,
  ReviewCluster,
  VaultRecord,
} from '../types/index.js';
import { toProviderInfo } from '../types/index.js';
import type { AppConfig } from '../config.js';
import type { ProviderRegistry } from '../providers/index.js';
import {
  applyDecision,
  detect,
  exportAll,
  group,
  importAllSettled,
  parseCsv,
  parseCsvHeader,
  pickRecord,
  searchRecords,
  toCsv,
} from '../vault/index.js';
import { recordId } from '../vault/model.js';
import { SessionError, createLogger } from '../utils/index.js';
import { ChangeLog, type ChangeLogDocument, saveChangeLog, sha256 } from './changelog.js';

const log = createLogger('session');

export const AUTO_PROVIDER = 'auto';

export interface LoadedFile {
  path: string;
  providerId: string;
  sha256: string;
  detection?: DetectionResult;
}

export interface LoadSummary {
  filePath: string;
  providerId: string;
  detection?: DetectionResult;
  imported: number;
  warnings: ImportWarning[];
}

export interface ExportOptions {
  provider?: string;
  keepUndecided?: boolean;
  changelogPath?: string;
}

export interface ExportSummary {
  outputPath: string;
  providerId: string;
  exported: number;
  undecidedKept: number;
  sha256: string;
  changelogPath?: string;
}

export interface SearchHit extends RecordSummary {
  /** Undecided cluster the record belongs to, if any. */
  pendingClusterId?: string;
}

interface SettledCluster {
  decision: Decision;
  outcome: DecisionOutcome;
}

/**
 * State for one CSV file between tool calls: the imported records, the
 * latest grouping and the decisions taken on its pending clusters.
 */
export class DedupeSession {
  private file?: LoadedFile;
  private records: VaultRecord[] = [];
  private result?: GroupResult;
  private readonly settled = new Map<string, SettledCluster>();
  private readonly changes: ChangeLog;

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly config: AppConfig,
    now: () => number = Date.now,
  ) {
    this.changes = new ChangeLog(now);
  }

  get loadedFile(): LoadedFile | undefined {
    return this.file;
  }

  get recordCount(): number {
    return this.records.length;
  }

  get changeLog(): ChangeLog {
    return this.changes;
  }

  get groupResult(): GroupResult | undefined {
    return this.result;
  }

  providers(): ProviderInfo[] {
    return this.registry.plugins().map(toProviderInfo);
  }

  async detectFile(filePath: string): Promise<DetectionResult> {
    const headers = parseCsvHeader(await fs.readFile(filePath, 'utf-8'));
    return detect(this.registry, headers, { threshold: this.config.detectionThreshold });
  }

  /** Import a CSV, replacing whatever the session held. */
  async load(filePath: string, provider: string = AUTO_PROVIDER): Promise<LoadSummary> {
    const text = await fs.readFile(filePath, 'utf-8');
    const { headers, rows } = parseCsv(text);

    let providerId = provider;
    let detection: DetectionResult | undefined;
    if (provider === AUTO_PROVIDER) {
      detection = detect(this.registry, headers, { threshold: this.config.detectionThreshold });
      if (detection.status !== 'matched') {
        throw new SessionError(`Cannot detect provider for ${filePath}: ${detection.explanation}`);
      }
      providerId = detection.providerId;
    }

    const report = importAllSettled(this.registry, providerId, rows);
    const [firstError] = report.errors;
    if (firstError) throw firstError;

    this.file = { path: filePath, providerId, sha256: sha256(text), detection };
    this.records = report.records;
    this.result = undefined;
    this.settled.clear();
    this.changes.clear();

    log.info(`Loaded ${report.records.length} records from ${filePath} as ${providerId}`);
    return { filePath, providerId, detection, imported: report.records.length, warnings: report.warnings };
  }

  /** Group the loaded records. Earlier decisions and change entries are discarded. */
  findDuplicates(options: GroupingOptions = {}): GroupResult {
    this.requireLoaded();
    const result = group(this.records, {
      strictPasswords: options.strictPasswords ?? this.config.strictPasswords,
      emailUsernameEquivalence: options.emailUsernameEquivalence ?? this.config.emailUsernameEquivalence,
    });

    this.result = result;
    this.settled.clear();
    this.changes.clear();
    for (const removal of result.removed) {
      this.changes.recordExactRemoval(removal.clusterId, recordId(removal.kept), removal.removed.map(recordId));
    }
    return result;
  }

  pendingClusters(): ReviewCluster[] {
    return this.requireGrouped().pending.filter(c => !this.settled.has(c.id));
  }

  isSettled(clusterId: string): boolean {
    return this.settled.has(clusterId);
  }

  cluster(clusterId: string): ReviewCluster {
    const found = this.requireGrouped().pending.find(c => c.id === clusterId);
    if (!found) throw new SessionError(`No cluster needs review with id ${clusterId}`);
    return found;
  }

  resolve(clusterId: string, decision: Decision): DecisionOutcome {
    const cluster = this.cluster(clusterId);
    if (this.settled.has(clusterId)) throw new SessionError(`Cluster ${clusterId} is already resolved`);

    const outcome = applyDecision(cluster, decision);
    this.settled.set(clusterId, { decision, outcome });

    switch (decision.kind) {
      case 'keep-one':
      case 'keep-best': {
        const [kept] = outcome.records;
        this.changes.recordMerge(clusterId, kept ? recordId(kept) : '', outcome.discarded.map(recordId));
        break;
      }
      case 'keep-all':
        this.changes.recordKeepAll(clusterId, outcome.records.map(recordId));
        break;
      case 'skip':
        this.changes.recordSkip(clusterId, outcome.records.map(recordId));
        break;
    }
    return outcome;
  }

  /** Settle every undecided cluster with its preferred record. */
  autoResolve(): string[] {
    const ids = this.pendingClusters().map(c => c.id);
    for (const id of ids) this.resolve(id, { kind: 'keep-best' });
    return ids;
  }

  /** Id of the cluster member named by `query`: a recordId or a fuzzy title, URL, username or email. */
  memberId(clusterId: string, query: string): string {
    return recordId(pickRecord(this.cluster(clusterId).members, query));
  }

  search(query: string, limit?: number): SearchHit[] {
    const pendingOf = new Map<string, string>();
    if (this.result) {
      for (const cluster of this.pendingClusters()) {
        for (const member of cluster.members) pendingOf.set(recordId(member), cluster.id);
      }
    }
    return searchRecords(this.currentRecords(true), query, limit)
      .map(summary => ({ ...summary, pendingClusterId: pendingOf.get(summary.id) }));
  }

  /**
   * Records as they would be written now: auto-resolved survivors, then each
   * pending cluster's outcome. Undecided clusters contribute their members
   * only when `keepUndecided` is set.
   */
  currentRecords(keepUndecided: boolean = false): VaultRecord[] {
    if (!this.result) return [...this.records];
    const out = [...this.result.autoResolved];
    for (const cluster of this.result.pending) {
      const settled = this.settled.get(cluster.id);
      if (settled) out.push(...settled.outcome.records);
      else if (keepUndecided) out.push(...cluster.members);
    }
    return out;
  }

  async export(outputPath: string, options: ExportOptions = {}): Promise<ExportSummary> {
    const file = this.requireLoaded();
    const keepUndecided = options.keepUndecided ?? false;
    const undecided = this.result ? this.pendingClusters() : [];
    if (undecided.length > 0 && !keepUndecided) {
      throw new SessionError(
        `${undecided.length} cluster(s) still need a decision: ${undecided.map(c => c.id).join(', ')}`,
      );
    }

    const providerId = options.provider ?? file.providerId;
    const plugin = this.registry.get(providerId);
    const records = this.currentRecords(keepUndecided);
    const text = toCsv(plugin.exportColumns, exportAll(this.registry, providerId, records));
    await fs.writeFile(outputPath, text, 'utf-8');
    const outputSha256 = sha256(text);

    if (options.changelogPath) {
      await saveChangeLog(options.changelogPath, this.changeLogDocument(outputPath, outputSha256));
    }

    log.info(`Exported ${records.length} records to ${outputPath} as ${providerId}`);
    return {
      outputPath,
      providerId,
      exported: records.length,
      undecidedKept: undecided.length,
      sha256: outputSha256,
      changelogPath: options.changelogPath,
    };
  }

  changeLogDocument(outputFile: string = '', outputSha256: string = ''): ChangeLogDocument {
    const file = this.requireLoaded();
    return this.changes.toDocument({
      inputFile: file.path,
      outputFile,
      inputSha256: file.sha256,
      outputSha256,
    });
  }

  private requireLoaded(): LoadedFile {
    if (!this.file) throw new SessionError('No file loaded; call import_csv first');
    return this.file;
  }

  private requireGrouped(): GroupResult {
    this.requireLoaded();
    if (!this.result) throw new SessionError('No duplicate scan yet; call find_duplicates first');
    return this.result;
  }
}
