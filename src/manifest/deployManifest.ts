import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';

import { z } from 'zod/v4';

import { DeployError } from '../errors.js';
import type { TokenLiteral, TokenMap } from '../tokens/tokenResolver.js';

const tokenLiteralSchema = z.union([z.string(), z.number(), z.boolean()]);

const envTokenSchema = z.strictObject({
  env: z.string().min(1),
  default: tokenLiteralSchema.optional()
});

const tokenEntrySchema = z.union([tokenLiteralSchema, envTokenSchema]);

const tokenNameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'token names must match [A-Za-z_][A-Za-z0-9_.-]*');

const credentialSchema = z.strictObject({
  userName: z.string().min(1),
  password: z.string(),
  windowsCredentials: z.boolean().optional()
});

const reportsSchema = z.strictObject({
  project: z.string().min(1),
  configuration: z.string().min(1).optional(),
  serverUrl: z.string().min(1).optional(),
  folders: z
    .strictObject({
      reports: z.string().optional(),
      dataSources: z.string().optional(),
      dataSets: z.string().optional()
    })
    .optional(),
  overwrite: z
    .strictObject({
      dataSources: z.boolean().optional(),
      dataSets: z.boolean().optional(),
      reports: z.boolean().optional()
    })
    .optional(),
  dataSourceCredentials: z.record(z.string(), credentialSchema).optional()
});

const namespacesSchema = z.strictObject({
  server: z.string().min(1),
  internalHost: z.string().min(1),
  externalHost: z.string().min(1).optional(),
  autodiscoverHost: z.string().min(1).optional(),
  services: z.array(z.string().min(1)).optional(),
  outlookAnywhere: z
    .strictObject({
      internalAuth: z.string().min(1).optional(),
      externalAuth: z.string().min(1).optional()
    })
    .optional(),
  requireSsl: z.boolean().optional()
});

const manifestSchema = z
  .strictObject({
    tokens: z.record(tokenNameSchema, tokenEntrySchema).default({}),
    reports: reportsSchema.optional(),
    namespaces: namespacesSchema.optional()
  })
  .refine((manifest) => manifest.reports !== undefined || manifest.namespaces !== undefined, {
    message: 'manifest needs a "reports" or "namespaces" section'
  });

export type TokenEntry = z.infer<typeof tokenEntrySchema>;
export type ReportsSettings = z.infer<typeof reportsSchema>;
export type NamespaceSettings = z.infer<typeof namespacesSchema>;
export type DataSourceCredentialSettings = z.infer<typeof credentialSchema>;
export type DeployManifest = z.infer<typeof manifestSchema>;

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>): string {
  return issues
    .map((issue) => {
      const where = issue.path.map((segment) => String(segment)).join('.');
      return where ? `${where}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

export interface ParseManifestOptions {
  /** Directory that relative paths in the manifest are resolved against. */
  baseDir: string;
  source?: string;
}

export function parseDeployManifest(raw: unknown, options: ParseManifestOptions): DeployManifest {
  const source = options.source ?? 'deployment manifest';
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DeployError('INVALID_MANIFEST', `Invalid ${source}: ${formatIssues(parsed.error.issues)}`, {
      details: { source, issues: parsed.error.issues.length }
    });
  }

  const manifest = parsed.data;
  if (manifest.reports && !isAbsolute(manifest.reports.project)) {
    return {
      ...manifest,
      reports: {
        ...manifest.reports,
        project: resolve(options.baseDir, manifest.reports.project)
      }
    };
  }
  return manifest;
}

export async function loadDeployManifest(path: string): Promise<DeployManifest> {
  const absolute = resolve(path);
  let text: string;
  try {
    text = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new DeployError('INVALID_MANIFEST', `Cannot read deployment manifest ${absolute}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DeployError('INVALID_MANIFEST', `Deployment manifest ${absolute} is not valid JSON`, { cause: error });
  }

  return parseDeployManifest(raw, { baseDir: dirname(absolute), source: absolute });
}

/**
 * Turns manifest token entries into a resolver map. `{ "env": NAME }` entries become
 * deferred tokens so the environment is read only if the token is actually resolved.
 */
export function buildTokenMap(entries: Record<string, TokenEntry>, env: NodeJS.ProcessEnv = process.env): TokenMap {
  const tokens: TokenMap = {};
  for (const [name, entry] of Object.entries(entries)) {
    if (typeof entry === 'object') {
      const variable = entry.env;
      const fallback = entry.default;
      tokens[name] = (): TokenLiteral => {
        const value = env[variable];
        if (value !== undefined) {
          return value;
        }
        if (fallback !== undefined) {
          return fallback;
        }
        throw new Error(`environment variable ${variable} is not set`);
      };
      continue;
    }
    tokens[name] = entry;
  }
  return tokens;
}
