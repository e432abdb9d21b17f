import type { Logger } from 'pino';

import type { AppConfig } from './config.js';
import { normalizeBaseUrl } from './config.js';
import { DeployError } from './errors.js';
import { DeployJournal } from './journal/deployJournal.js';
import { buildTokenMap, type DeployManifest } from './manifest/deployManifest.js';
import { buildNamespacePlan, type NamespacePlan } from './namespaces/mailNamespaces.js';
import { loadReportProject } from './project/reportProject.js';
import { publishReportProject, resolvePortalUrl, resolvePublishSettings, type PublishSummary } from './publish/publisher.js';
import { ReportServerClient, type SystemInfo } from './reporting/client.js';
import { resolveTokens, type ResolvedTokens } from './tokens/tokenResolver.js';

export type DeployLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export interface DeployContext {
  config: AppConfig;
  logger: DeployLogger;
  journal?: DeployJournal;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
}

export function resolveManifestTokens(manifest: DeployManifest, env: NodeJS.ProcessEnv = process.env): ResolvedTokens {
  return resolveTokens(buildTokenMap(manifest.tokens, env));
}

function createJournal(context: DeployContext): DeployJournal {
  return context.journal ?? new DeployJournal(context.config.journalMaxEntries, context.config.journalPath);
}

async function prepareReports(manifest: DeployManifest, context: DeployContext) {
  const reports = manifest.reports;
  if (!reports) {
    throw new DeployError('INVALID_MANIFEST', 'The manifest has no "reports" section');
  }

  const resolved = resolveManifestTokens(manifest, context.env);
  context.logger.debug({ tokens: Object.keys(resolved) }, 'Tokens resolved');

  const project = await loadReportProject(reports.project, reports.configuration);
  const baseUrl = normalizeBaseUrl(
    resolvePortalUrl(project, reports, resolved, context.config.portalUrl),
    'report server URL'
  );

  const client = new ReportServerClient({
    baseUrl,
    user: context.config.rsUser,
    pass: context.config.rsPass,
    timeoutMs: context.config.requestTimeoutMs,
    readRetries: context.config.readRetries,
    readRetryBackoffMs: context.config.readRetryBackoffMs,
    logger: context.logger,
    fetchImpl: context.fetchImpl
  });

  return { reports, resolved, project, baseUrl, client };
}

export async function runPublish(manifest: DeployManifest, context: DeployContext): Promise<PublishSummary> {
  const { reports, resolved, project, baseUrl, client } = await prepareReports(manifest, context);
  const journal = createJournal(context);

  context.logger.info({ baseUrl, configuration: project.configuration.name }, 'Report server target');

  const summary = await publishReportProject({
    client,
    project,
    settings: resolvePublishSettings(project, reports, resolved),
    tokens: resolved,
    journal,
    logger: context.logger,
    dryRun: context.config.dryRun
  });

  const persistFailure = journal.lastPersistFailure();
  if (persistFailure) {
    context.logger.warn({ path: persistFailure.path, error: String(persistFailure.error) }, 'Deployment journal could not be written');
  }

  return summary;
}

export async function runCheck(manifest: DeployManifest, context: DeployContext): Promise<SystemInfo> {
  const { client, baseUrl } = await prepareReports(manifest, context);
  const info = await client.getSystemInfo();
  context.logger.info({ baseUrl, ...info }, 'Report server reachable');
  return info;
}

export function runNamespacePlan(manifest: DeployManifest, context: Pick<DeployContext, 'env' | 'logger'>): NamespacePlan {
  const settings = manifest.namespaces;
  if (!settings) {
    throw new DeployError('INVALID_MANIFEST', 'The manifest has no "namespaces" section');
  }
  const plan = buildNamespacePlan(settings, resolveManifestTokens(manifest, context.env));
  context.logger.info(
    { server: plan.server, services: plan.virtualDirectories.map((entry) => entry.service) },
    'Namespace plan built'
  );
  return plan;
}
