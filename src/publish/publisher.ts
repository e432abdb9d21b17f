import { readFile } from 'node:fs/promises';

import type { Logger } from 'pino';

import { asDeployError, DeployError } from '../errors.js';
import type { DeployJournal, JournalKind, JournalResult } from '../journal/deployJournal.js';
import type { DataSourceCredentialSettings, ReportsSettings } from '../manifest/deployManifest.js';
import { itemNameFromFile, type ProjectItem, type ReportProject } from '../project/reportProject.js';
import { parseDataSourceDefinition, parseReportReferences, parseSharedDataSetDefinition } from '../project/definitions.js';
import { catalogPathSegments, joinCatalogPath, normalizeCatalogPath, toPortalUrl } from '../reporting/catalogPath.js';
import type {
  CatalogItem,
  CatalogItemType,
  CredentialRetrieval,
  DataSourceDefinition,
  ItemReference,
  ReportServerClient
} from '../reporting/client.js';
import { expandTokens, expandTokensDeep, type ResolvedTokens } from '../tokens/tokenResolver.js';

export type PublishClient = Pick<
  ReportServerClient,
  | 'getCatalogItem'
  | 'createFolder'
  | 'createDataSource'
  | 'updateDataSource'
  | 'createDataSet'
  | 'updateDataSet'
  | 'createReport'
  | 'updateReport'
  | 'setDataSetDataSource'
  | 'setReportDataSources'
  | 'setReportSharedDataSets'
>;

export interface PublishSettings {
  reportFolder: string;
  dataSourceFolder: string;
  dataSetFolder: string;
  overwriteDataSources: boolean;
  overwriteDataSets: boolean;
  overwriteReports: boolean;
  dataSourceCredentials: Record<string, DataSourceCredentialSettings>;
}

export type PublishAction = 'create' | 'update' | 'skip' | 'bind' | 'none';

export interface PublishStep {
  kind: JournalKind;
  operation: string;
  target: string;
  action: PublishAction;
  result: JournalResult;
  durationMs: number;
}

export interface KindCounts {
  created: number;
  updated: number;
  skipped: number;
  planned: number;
}

export interface PublishSummary {
  dryRun: boolean;
  folders: {
    reports: string;
    dataSources: string;
    dataSets: string;
  };
  counts: {
    dataSources: KindCounts;
    dataSets: KindCounts;
    reports: KindCounts;
  };
  steps: PublishStep[];
}

export interface PublishOptions {
  client: PublishClient;
  project: ReportProject;
  settings: PublishSettings;
  /** Resolved tokens, expanded into data source connection strings. */
  tokens?: ResolvedTokens;
  journal: DeployJournal;
  logger: Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;
  dryRun?: boolean;
}

const DEFAULT_DATA_SOURCE_FOLDER = '/Data Sources';
const DEFAULT_DATA_SET_FOLDER = '/Datasets';

function pickString(override: string | undefined, fromProject: string | undefined, resolved: ResolvedTokens): string | undefined {
  const raw = override ?? fromProject;
  return raw === undefined ? undefined : expandTokens(raw, resolved);
}

/**
 * Merges manifest overrides over the project's configuration. Token references are
 * expanded in every folder and credential value.
 */
export function resolvePublishSettings(
  project: ReportProject,
  overrides: ReportsSettings | undefined,
  resolved: ResolvedTokens
): PublishSettings {
  const config = project.configuration;
  const defaultReportFolder = project.projectPath ? itemNameFromFile(project.projectPath) : '/';

  const credentials: Record<string, DataSourceCredentialSettings> = {};
  for (const [name, entry] of Object.entries(overrides?.dataSourceCredentials ?? {})) {
    credentials[name] = expandTokensDeep(entry, resolved);
  }

  return {
    reportFolder: normalizeCatalogPath(
      pickString(overrides?.folders?.reports, config.targetReportFolder, resolved) ?? defaultReportFolder
    ),
    dataSourceFolder: normalizeCatalogPath(
      pickString(overrides?.folders?.dataSources, config.targetDataSourceFolder, resolved) ?? DEFAULT_DATA_SOURCE_FOLDER
    ),
    dataSetFolder: normalizeCatalogPath(
      pickString(overrides?.folders?.dataSets, config.targetDataSetFolder, resolved) ?? DEFAULT_DATA_SET_FOLDER
    ),
    overwriteDataSources: overrides?.overwrite?.dataSources ?? config.overwriteDataSources,
    overwriteDataSets: overrides?.overwrite?.dataSets ?? config.overwriteDataSets,
    overwriteReports: overrides?.overwrite?.reports ?? true,
    dataSourceCredentials: credentials
  };
}

/** Environment override first, then the manifest, then the project's TargetServerURL. */
export function resolvePortalUrl(
  project: ReportProject,
  overrides: ReportsSettings | undefined,
  resolved: ResolvedTokens,
  envOverride?: string
): string {
  if (envOverride) {
    return envOverride;
  }
  if (overrides?.serverUrl) {
    return expandTokens(overrides.serverUrl, resolved).trim().replace(/\/+$/, '');
  }
  const target = project.configuration.targetServerUrl;
  if (target) {
    return toPortalUrl(expandTokens(target, resolved));
  }
  throw new DeployError(
    'INVALID_MANIFEST',
    `No report server URL: set RS_PORTAL_URL, reports.serverUrl, or TargetServerURL in configuration "${project.configuration.name}"`
  );
}

export function referencePath(folder: string, reference: string): string {
  return reference.trim().startsWith('/') ? normalizeCatalogPath(reference) : joinCatalogPath(folder, reference);
}

function emptyCounts(): KindCounts {
  return { created: 0, updated: 0, skipped: 0, planned: 0 };
}

interface PublishedDataSet {
  item: CatalogItem | null;
  dataSourceReference?: string;
}

interface PublishedReport {
  item: CatalogItem | null;
  dataSources: ItemReference[];
  sharedDataSets: ItemReference[];
}

interface StepOutcome<T> {
  action: PublishAction;
  result: JournalResult;
  value: T;
  details?: Record<string, unknown>;
}

class PublishRun {
  private readonly steps: PublishStep[] = [];
  private readonly dryRun: boolean;

  constructor(private readonly options: PublishOptions) {
    this.dryRun = options.dryRun ?? false;
  }

  private async runStep<T>(
    kind: JournalKind,
    operation: string,
    target: string,
    fn: () => Promise<StepOutcome<T>>
  ): Promise<StepOutcome<T>> {
    const started = Date.now();
    try {
      const outcome = await fn();
      const durationMs = Date.now() - started;
      this.steps.push({ kind, operation, target, action: outcome.action, result: outcome.result, durationMs });
      await this.options.journal.record({
        operation,
        kind,
        target,
        result: outcome.result,
        durationMs,
        details: { action: outcome.action, ...outcome.details }
      });
      this.options.logger.info({ operation, target, action: outcome.action, result: outcome.result, durationMs }, operation);
      return outcome;
    } catch (error) {
      const err = asDeployError(error);
      const durationMs = Date.now() - started;
      this.steps.push({ kind, operation, target, action: 'none', result: 'error', durationMs });
      await this.options.journal.record({
        operation,
        kind,
        target,
        result: 'error',
        durationMs,
        errorCode: err.code,
        message: err.message
      });
      this.options.logger.error({ operation, target, code: err.code, error: err.message }, `${operation} failed`);
      throw err;
    }
  }

  private async readItem(item: ProjectItem): Promise<Buffer> {
    if (!item.filePath) {
      throw new DeployError('INVALID_PROJECT', `Project item ${item.fileName} has no file path; load the project from disk`);
    }
    try {
      return await readFile(item.filePath);
    } catch (error) {
      throw new DeployError('INVALID_PROJECT', `Cannot read ${item.filePath}`, { cause: error });
    }
  }

  async ensureFolder(path: string): Promise<void> {
    const { client } = this.options;
    await this.runStep('folder', 'folder.ensure', path, async (): Promise<StepOutcome<undefined>> => {
      const created: string[] = [];
      let parent = '/';
      for (const segment of catalogPathSegments(path)) {
        const current = joinCatalogPath(parent, segment);
        const existing = await client.getCatalogItem(current);
        if (existing && existing.type !== 'Folder') {
          throw new DeployError('CONFLICT', `${current} exists as a ${existing.type}, not a folder`, {
            details: { path: current, type: existing.type }
          });
        }
        if (!existing) {
          if (!this.dryRun) {
            await client.createFolder(parent, segment);
          }
          created.push(current);
        }
        parent = current;
      }

      if (!created.length) {
        return { action: 'none', result: 'skipped', value: undefined, details: { exists: true } };
      }
      return {
        action: 'create',
        result: this.dryRun ? 'dry_run' : 'created',
        value: undefined,
        details: { created }
      };
    });
  }

  /**
   * Shared exists/overwrite branch: create when missing, update when overwriting,
   * otherwise leave the server copy alone.
   */
  private async upsert(
    expectedType: CatalogItemType,
    existing: CatalogItem | null,
    overwrite: boolean,
    create: () => Promise<CatalogItem>,
    update: (item: CatalogItem) => Promise<void>
  ): Promise<StepOutcome<CatalogItem | null>> {
    if (existing && existing.type !== expectedType) {
      throw new DeployError('CONFLICT', `${existing.path} exists as a ${existing.type}, not a ${expectedType}`, {
        details: { path: existing.path, type: existing.type, expected: expectedType }
      });
    }
    if (!existing) {
      if (this.dryRun) {
        return { action: 'create', result: 'dry_run', value: null };
      }
      return { action: 'create', result: 'created', value: await create() };
    }
    if (!overwrite) {
      return { action: 'skip', result: 'skipped', value: existing, details: { reason: 'exists and overwrite is disabled' } };
    }
    if (this.dryRun) {
      return { action: 'update', result: 'dry_run', value: existing };
    }
    await update(existing);
    return { action: 'update', result: 'updated', value: existing };
  }

  private credentialRetrieval(
    name: string,
    integratedSecurity: boolean,
    prompt: string | undefined
  ): Pick<DataSourceDefinition, 'credentialRetrieval' | 'credentials'> {
    const stored = this.options.settings.dataSourceCredentials[name];
    if (stored) {
      return {
        credentialRetrieval: 'Store',
        credentials: {
          userName: stored.userName,
          password: stored.password,
          useAsWindowsCredentials: stored.windowsCredentials
        }
      };
    }
    const retrieval: CredentialRetrieval = integratedSecurity ? 'Integrated' : prompt ? 'Prompt' : 'None';
    return { credentialRetrieval: retrieval };
  }

  async publishDataSource(item: ProjectItem, resolved: ResolvedTokens): Promise<JournalResult> {
    const { client, settings } = this.options;
    const target = joinCatalogPath(settings.dataSourceFolder, item.name);

    const outcome = await this.runStep('dataSource', 'datasource.publish', target, async (): Promise<StepOutcome<CatalogItem | null>> => {
      const raw = await this.readItem(item);
      const parsed = parseDataSourceDefinition(raw.toString('utf8'), item.filePath ?? item.fileName);
      const definition: DataSourceDefinition = {
        name: item.name,
        parentPath: settings.dataSourceFolder,
        extension: parsed.extension,
        connectionString: expandTokens(parsed.connectString, resolved),
        prompt: parsed.prompt,
        ...this.credentialRetrieval(item.name, parsed.integratedSecurity, parsed.prompt)
      };

      const existing = await client.getCatalogItem(target);
      return this.upsert(
        'DataSource',
        existing,
        settings.overwriteDataSources,
        () => client.createDataSource(definition),
        (found) => client.updateDataSource(found.id, definition)
      );
    });
    return outcome.result;
  }

  async publishDataSet(item: ProjectItem): Promise<JournalResult> {
    const { client, settings } = this.options;
    const target = joinCatalogPath(settings.dataSetFolder, item.name);

    const outcome = await this.runStep('dataSet', 'dataset.publish', target, async (): Promise<StepOutcome<PublishedDataSet>> => {
      const content = await this.readItem(item);
      const definition = parseSharedDataSetDefinition(content.toString('utf8'), item.filePath ?? item.fileName);

      const existing = await client.getCatalogItem(target);
      const upserted = await this.upsert(
        'DataSet',
        existing,
        settings.overwriteDataSets,
        () => client.createDataSet(settings.dataSetFolder, item.name, content),
        (found) => client.updateDataSet(found.id, content)
      );
      return { ...upserted, value: { item: upserted.value, dataSourceReference: definition.dataSourceReference } };
    });

    const { item: published, dataSourceReference } = outcome.value;
    if (dataSourceReference && outcome.result !== 'skipped') {
      const dataSourcePath = referencePath(settings.dataSourceFolder, dataSourceReference);
      await this.runStep('reference', 'dataset.bind', target, async (): Promise<StepOutcome<undefined>> => {
        if (this.dryRun || !published) {
          return { action: 'bind', result: 'dry_run', value: undefined, details: { dataSource: dataSourcePath } };
        }
        await client.setDataSetDataSource(published.id, dataSourcePath);
        return { action: 'bind', result: 'updated', value: undefined, details: { dataSource: dataSourcePath } };
      });
    }
    return outcome.result;
  }

  async publishReport(item: ProjectItem): Promise<JournalResult> {
    const { client, settings } = this.options;
    const target = joinCatalogPath(settings.reportFolder, item.name);

    const outcome = await this.runStep('report', 'report.publish', target, async (): Promise<StepOutcome<PublishedReport>> => {
      const content = await this.readItem(item);
      const refs = parseReportReferences(content.toString('utf8'), item.filePath ?? item.fileName);

      const existing = await client.getCatalogItem(target);
      const upserted = await this.upsert(
        'Report',
        existing,
        settings.overwriteReports,
        () => client.createReport(settings.reportFolder, item.name, content),
        (found) => client.updateReport(found.id, content)
      );
      return {
        ...upserted,
        value: {
          item: upserted.value,
          dataSources: refs.dataSources.map((ref) => ({
            name: ref.name,
            path: referencePath(settings.dataSourceFolder, ref.reference)
          })),
          sharedDataSets: refs.sharedDataSets.map((ref) => ({
            name: ref.name,
            path: referencePath(settings.dataSetFolder, ref.reference)
          }))
        }
      };
    });

    const { item: published, dataSources, sharedDataSets } = outcome.value;
    if (outcome.result !== 'skipped' && (dataSources.length || sharedDataSets.length)) {
      await this.runStep('reference', 'report.bind', target, async (): Promise<StepOutcome<undefined>> => {
        const details = {
          dataSources: dataSources.map((ref) => ref.path),
          sharedDataSets: sharedDataSets.map((ref) => ref.path)
        };
        if (this.dryRun || !published) {
          return { action: 'bind', result: 'dry_run', value: undefined, details };
        }
        if (dataSources.length) {
          await client.setReportDataSources(published.id, dataSources);
        }
        if (sharedDataSets.length) {
          await client.setReportSharedDataSets(published.id, sharedDataSets);
        }
        return { action: 'bind', result: 'updated', value: undefined, details };
      });
    }
    return outcome.result;
  }

  getSteps(): PublishStep[] {
    return [...this.steps];
  }
}

function count(counts: KindCounts, result: JournalResult): void {
  if (result === 'created') {
    counts.created += 1;
  } else if (result === 'updated') {
    counts.updated += 1;
  } else if (result === 'skipped') {
    counts.skipped += 1;
  } else if (result === 'dry_run') {
    counts.planned += 1;
  }
}

export async function publishReportProject(options: PublishOptions): Promise<PublishSummary> {
  const { project, settings, logger } = options;
  const resolved = options.tokens ?? {};
  const dryRun = options.dryRun ?? false;
  const run = new PublishRun(options);

  logger.info(
    {
      project: project.projectPath,
      configuration: project.configuration.name,
      dataSources: project.dataSources.length,
      dataSets: project.dataSets.length,
      reports: project.reports.length,
      dryRun
    },
    'Publishing report project'
  );

  const folders = [settings.reportFolder];
  if (project.dataSources.length) {
    folders.push(settings.dataSourceFolder);
  }
  if (project.dataSets.length) {
    folders.push(settings.dataSetFolder);
  }
  for (const folder of new Set(folders)) {
    await run.ensureFolder(folder);
  }

  const counts = {
    dataSources: emptyCounts(),
    dataSets: emptyCounts(),
    reports: emptyCounts()
  };

  for (const item of project.dataSources) {
    count(counts.dataSources, await run.publishDataSource(item, resolved));
  }
  for (const item of project.dataSets) {
    count(counts.dataSets, await run.publishDataSet(item));
  }
  for (const item of project.reports) {
    count(counts.reports, await run.publishReport(item));
  }

  logger.info({ counts, dryRun }, 'Report project published');

  return {
    dryRun,
    folders: {
      reports: settings.reportFolder,
      dataSources: settings.dataSourceFolder,
      dataSets: settings.dataSetFolder
    },
    counts,
    steps: run.getSteps()
  };
}
