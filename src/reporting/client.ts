import type { Logger } from 'pino';

import { DeployError, type ErrorCode } from '../errors.js';
import { joinCatalogPath, normalizeCatalogPath } from './catalogPath.js';

export interface ReportServerClientOptions {
  baseUrl: string;
  user?: string;
  pass?: string;
  timeoutMs: number;
  readRetries: number;
  readRetryBackoffMs: number;
  logger: Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;
  fetchImpl?: typeof fetch;
}

export type CatalogItemType = 'Folder' | 'Report' | 'DataSet' | 'DataSource' | (string & {});

export interface CatalogItem {
  id: string;
  name: string;
  path: string;
  type: CatalogItemType;
}

export type CredentialRetrieval = 'None' | 'Integrated' | 'Prompt' | 'Store';

export interface DataSourceCredentials {
  userName: string;
  password: string;
  useAsWindowsCredentials?: boolean;
}

export interface DataSourceDefinition {
  name: string;
  parentPath: string;
  extension: string;
  connectionString: string;
  credentialRetrieval: CredentialRetrieval;
  credentials?: DataSourceCredentials;
  prompt?: string;
}

export interface ItemReference {
  name: string;
  path: string;
}

export interface SystemInfo {
  productName: string;
  productVersion: string;
  reportServerUrl?: string;
}

interface RequestOptions {
  idempotent?: boolean;
  allowNotFound?: boolean;
}

const API_PREFIX = '/api/v2.0';

const SENSITIVE_LOG_KEYS = new Set(['password', 'connectionstring', 'content', 'credentialsbyuser', 'authorization']);

function redactForLog(value: unknown, depth = 0): unknown {
  if (!value || typeof value !== 'object') {
    return value;
  }
  if (depth >= 6) {
    return '[REDACTED:DEPTH_LIMIT]';
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactForLog(item, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    if (SENSITIVE_LOG_KEYS.has(key.trim().toLowerCase())) {
      result[key] = '[REDACTED]';
      continue;
    }
    result[key] = redactForLog(nested, depth + 1);
  }
  return result;
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function odataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function odataErrorMessage(payload: unknown): string | null {
  if (!isRecord(payload)) {
    return null;
  }
  const error = payload.error;
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  return typeof payload.message === 'string' ? payload.message : null;
}

function codeForStatus(status: number): ErrorCode {
  if (status === 401 || status === 403) {
    return 'AUTH';
  }
  if (status === 404) {
    return 'NOT_FOUND';
  }
  if (status === 409) {
    return 'CONFLICT';
  }
  if (status >= 500) {
    return 'SERVER_ERROR';
  }
  return 'BAD_REQUEST';
}

export function toCatalogItem(payload: unknown): CatalogItem {
  if (!isRecord(payload)) {
    throw new DeployError('SERVER_ERROR', 'Report server returned a catalog item that is not an object');
  }
  const { Id, Name, Path, Type } = payload;
  if (typeof Id !== 'string' || typeof Path !== 'string') {
    throw new DeployError('SERVER_ERROR', 'Report server returned a catalog item without Id or Path', {
      details: { keys: Object.keys(payload) }
    });
  }
  return {
    id: Id,
    name: typeof Name === 'string' ? Name : '',
    path: Path,
    type: typeof Type === 'string' ? Type : 'Unknown'
  };
}

function encodeContent(content: string | Uint8Array): string {
  const bytes = typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content);
  return bytes.toString('base64');
}

export class ReportServerClient {
  private readonly fetchImpl: typeof fetch;
  private readonly apiBase: string;

  constructor(private readonly options: ReportServerClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.apiBase = `${options.baseUrl.replace(/\/+$/, '')}${API_PREFIX}`;
  }

  private buildUrl(resource: string): URL {
    return new URL(`${this.apiBase}${resource}`);
  }

  private buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json'
    };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.options.user) {
      const basic = Buffer.from(`${this.options.user}:${this.options.pass ?? ''}`).toString('base64');
      headers.Authorization = `Basic ${basic}`;
    }
    return headers;
  }

  private async executeFetch(url: URL, init: RequestInit, options: { idempotent: boolean }): Promise<Response> {
    const retries = options.idempotent ? this.options.readRetries : 0;

    let lastError: unknown;
    for (let attempt = 0; attempt <= retries; attempt += 1) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

      try {
        const response = await this.fetchImpl(url, {
          ...init,
          signal: controller.signal
        });
        clearTimeout(timeout);

        if (options.idempotent && response.status >= 500 && attempt < retries) {
          this.options.logger.warn(
            { url: url.pathname, status: response.status, attempt: attempt + 1 },
            'Report server read failed, retrying'
          );
          await wait(this.options.readRetryBackoffMs * (attempt + 1));
          continue;
        }

        return response;
      } catch (error) {
        clearTimeout(timeout);
        lastError = error;
        if (attempt >= retries) {
          break;
        }
        await wait(this.options.readRetryBackoffMs * (attempt + 1));
      }
    }

    if (lastError instanceof Error && lastError.name === 'AbortError') {
      throw new DeployError('TIMEOUT', `Request timed out for ${url.pathname}`, { cause: lastError });
    }
    throw new DeployError('NETWORK', `Network failure for ${url.pathname}`, { cause: lastError });
  }

  private async parseResponse(response: Response, url: URL): Promise<unknown> {
    const rawText = await response.text();

    let payload: unknown = null;
    const trimmed = rawText.trim();
    if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
      try {
        payload = JSON.parse(trimmed);
      } catch {
        payload = rawText;
      }
    } else if (trimmed) {
      payload = rawText;
    }

    if (!response.ok) {
      const serverMessage = odataErrorMessage(payload) ?? (trimmed || response.statusText);
      throw new DeployError(codeForStatus(response.status), `HTTP ${response.status} for ${url.pathname}: ${serverMessage}`, {
        statusCode: response.status
      });
    }

    return payload;
  }

  private async request(
    method: 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE',
    resource: string,
    body?: unknown,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const url = this.buildUrl(resource);
    const idempotent = options.idempotent ?? method === 'GET';

    this.options.logger.debug({ method, url: url.pathname, body: redactForLog(body) }, 'Report server request');

    const response = await this.executeFetch(
      url,
      {
        method,
        headers: this.buildHeaders(body !== undefined),
        body: body === undefined ? undefined : JSON.stringify(body)
      },
      { idempotent }
    );

    try {
      return await this.parseResponse(response, url);
    } catch (error) {
      if (options.allowNotFound && error instanceof DeployError && error.code === 'NOT_FOUND') {
        return null;
      }
      throw error;
    }
  }

  async getSystemInfo(): Promise<SystemInfo> {
    const payload = await this.request('GET', '/System');
    if (!isRecord(payload)) {
      throw new DeployError('SERVER_ERROR', 'Report server returned an unexpected /System payload');
    }
    return {
      productName: typeof payload.ProductName === 'string' ? payload.ProductName : 'unknown',
      productVersion: typeof payload.ProductVersion === 'string' ? payload.ProductVersion : 'unknown',
      reportServerUrl: typeof payload.ReportServerAbsoluteUrl === 'string' ? payload.ReportServerAbsoluteUrl : undefined
    };
  }

  async getCatalogItem(path: string): Promise<CatalogItem | null> {
    const normalized = normalizeCatalogPath(path);
    const payload = await this.request('GET', `/CatalogItems(Path=${encodeURIComponent(odataString(normalized))})`, undefined, {
      allowNotFound: true
    });
    return payload === null ? null : toCatalogItem(payload);
  }

  async createFolder(parentPath: string, name: string): Promise<CatalogItem> {
    const payload = await this.request('POST', '/Folders', {
      Name: name,
      Path: joinCatalogPath(parentPath, name)
    });
    return toCatalogItem(payload);
  }

  private dataSourceBody(def: DataSourceDefinition): Record<string, unknown> {
    const body: Record<string, unknown> = {
      Name: def.name,
      Path: joinCatalogPath(def.parentPath, def.name),
      Type: 'DataSource',
      DataSourceType: def.extension,
      ConnectionString: def.connectionString,
      CredentialRetrieval: def.credentialRetrieval,
      IsEnabled: true,
      IsConnectionStringOverridden: true
    };
    if (def.credentialRetrieval === 'Store' && def.credentials) {
      body.CredentialsByUser = {
        DisplayText: null,
        UserName: def.credentials.userName,
        Password: def.credentials.password,
        UseAsWindowsCredentials: def.credentials.useAsWindowsCredentials ?? false
      };
    }
    if (def.credentialRetrieval === 'Prompt') {
      body.CredentialsInServer = null;
      body.CredentialsByUser = null;
      body.Prompt = def.prompt ?? null;
    }
    return body;
  }

  async createDataSource(def: DataSourceDefinition): Promise<CatalogItem> {
    const payload = await this.request('POST', '/DataSources', this.dataSourceBody(def));
    return toCatalogItem(payload);
  }

  async updateDataSource(id: string, def: DataSourceDefinition): Promise<void> {
    await this.request('PATCH', `/DataSources(${id})`, this.dataSourceBody(def));
  }

  async createDataSet(parentPath: string, name: string, content: string | Uint8Array): Promise<CatalogItem> {
    const payload = await this.request('POST', '/DataSets', {
      '@odata.type': '#Model.DataSet',
      Name: name,
      Path: joinCatalogPath(parentPath, name),
      Content: encodeContent(content),
      ContentType: ''
    });
    return toCatalogItem(payload);
  }

  async updateDataSet(id: string, content: string | Uint8Array): Promise<void> {
    await this.request('PATCH', `/DataSets(${id})`, {
      '@odata.type': '#Model.DataSet',
      Content: encodeContent(content)
    });
  }

  async createReport(parentPath: string, name: string, content: string | Uint8Array): Promise<CatalogItem> {
    const payload = await this.request('POST', '/Reports', {
      '@odata.type': '#Model.Report',
      Name: name,
      Path: joinCatalogPath(parentPath, name),
      Content: encodeContent(content),
      ContentType: ''
    });
    return toCatalogItem(payload);
  }

  async updateReport(id: string, content: string | Uint8Array): Promise<void> {
    await this.request('PATCH', `/Reports(${id})`, {
      '@odata.type': '#Model.Report',
      Content: encodeContent(content)
    });
  }

  async setDataSetDataSource(dataSetId: string, dataSourcePath: string): Promise<void> {
    await this.request('PUT', `/DataSets(${dataSetId})/DataSources`, [
      {
        Name: 'DataSetDataSource',
        IsReference: true,
        Path: normalizeCatalogPath(dataSourcePath)
      }
    ]);
  }

  async setReportDataSources(reportId: string, refs: ItemReference[]): Promise<void> {
    await this.request(
      'PUT',
      `/Reports(${reportId})/DataSources`,
      refs.map((ref) => ({
        Name: ref.name,
        IsReference: true,
        Path: normalizeCatalogPath(ref.path)
      }))
    );
  }

  async setReportSharedDataSets(reportId: string, refs: ItemReference[]): Promise<void> {
    await this.request(
      'PUT',
      `/Reports(${reportId})/SharedDataSets`,
      refs.map((ref) => ({
        Name: ref.name,
        Path: normalizeCatalogPath(ref.path)
      }))
    );
  }

  async deleteCatalogItem(id: string): Promise<void> {
    await this.request('DELETE', `/CatalogItems(${id})`);
  }
}
