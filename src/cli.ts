import type { Logger } from 'pino';

import { loadConfig, type AppConfig } from './config.js';
import { runCheck, runNamespacePlan, runPublish } from './deploy.js';
import { actionableErrorFields, asDeployError } from './errors.js';
import { createLogger } from './logger.js';
import { loadDeployManifest } from './manifest/deployManifest.js';

export type Command = 'publish' | 'namespaces' | 'check';

export type CliLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error' | 'flush'>;

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  makeLogger?: (level: string, pretty: boolean) => CliLogger;
  /** Receives command output such as the namespace plan. */
  write?: (text: string) => void;
  fetchImpl?: typeof fetch;
}

const COMMANDS: readonly Command[] = ['publish', 'namespaces', 'check'];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: string[]): { command: Command; manifestPath?: string } {
  const [first, second] = argv;
  if (first === undefined) {
    return { command: 'publish' };
  }
  if (isCommand(first)) {
    return { command: first, manifestPath: second };
  }
  // A lone path means "publish this manifest".
  return { command: 'publish', manifestPath: first };
}

function reportFailure(logger: CliLogger, error: unknown): number {
  const err = asDeployError(error);
  logger.error({ code: err.code, details: err.details, ...actionableErrorFields(err.code) }, err.message);
  logger.flush();
  return 1;
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const makeLogger = options.makeLogger ?? createLogger;
  const write = options.write ?? ((text: string) => process.stdout.write(text));

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    // No configured logger yet; report with the defaults.
    return reportFailure(makeLogger('info', false), error);
  }

  const logger = makeLogger(config.logLevel, config.logPretty);
  const { command, manifestPath } = parseArgs(argv);
  const context = { config, logger, env, fetchImpl: options.fetchImpl };

  try {
    const manifest = await loadDeployManifest(manifestPath ?? config.manifestPath);

    if (command === 'namespaces') {
      const plan = runNamespacePlan(manifest, context);
      write(`${JSON.stringify(plan, null, 2)}\n`);
      return 0;
    }

    if (command === 'check') {
      await runCheck(manifest, context);
      return 0;
    }

    const summary = await runPublish(manifest, context);
    logger.info({ counts: summary.counts, folders: summary.folders, dryRun: summary.dryRun }, 'Deployment finished');
    return 0;
  } catch (error) {
    return reportFailure(logger, error);
  }
}
