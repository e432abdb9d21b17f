import { describe, expect, test, vi } from 'vitest';

import { ReportServerClient, type ReportServerClientOptions } from '../../src/reporting/client.js';
import { FAKE_PORTAL_URL, FakeReportServer } from './helpers/fakeReportServer.js';

function makeLogger() {
  return {
    debug: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    error: vi.fn()
  };
}

function makeClient(fetchImpl: typeof fetch, overrides: Partial<Omit<ReportServerClientOptions, 'fetchImpl'>> = {}) {
  const logger = overrides.logger ?? (makeLogger() as ReportServerClientOptions['logger']);
  return new ReportServerClient({
    baseUrl: FAKE_PORTAL_URL,
    timeoutMs: 5_000,
    readRetries: 0,
    readRetryBackoffMs: 10,
    logger,
    fetchImpl,
    ...overrides
  });
}

describe('ReportServerClient', () => {
  test('reads system information with basic auth', async () => {
    const server = new FakeReportServer();
    const client = makeClient(server.fetchImpl, { user: 'deployer', pass: 'test-secret' });

    await expect(client.getSystemInfo()).resolves.toEqual({
      productName: 'SQL Server Reporting Services',
      productVersion: '15.0.1102.1075',
      reportServerUrl: 'http://rs.example.test/ReportServer'
    });
    expect(server.calls[0]?.authorization).toBe(`Basic ${Buffer.from('deployer:test-secret').toString('base64')}`);
  });

  test('sends no authorization header without a user', async () => {
    const server = new FakeReportServer();
    const client = makeClient(server.fetchImpl);

    await client.getSystemInfo();

    expect(server.calls[0]?.authorization).toBeNull();
  });

  test('looks items up by path and returns null when missing', async () => {
    const server = new FakeReportServer();
    server.seed("/Sales Dev/O'Brien", 'Report');
    const client = makeClient(server.fetchImpl);

    await expect(client.getCatalogItem("Sales Dev/O'Brien")).resolves.toEqual({
      id: 'id-1',
      name: "O'Brien",
      path: "/Sales Dev/O'Brien",
      type: 'Report'
    });
    expect(server.calls[0]?.resource).toBe("/CatalogItems(Path='/Sales Dev/O''Brien')");

    await expect(client.getCatalogItem('/Sales Dev/Missing')).resolves.toBeNull();
  });

  test('percent-encodes catalog paths so # and % reach the server intact', async () => {
    const server = new FakeReportServer();
    server.seed('/Sales/Q#1 Orders', 'Report');
    server.seed('/Sales/100% Done', 'Report');
    const client = makeClient(server.fetchImpl);

    await expect(client.getCatalogItem('/Sales/Q#1 Orders')).resolves.toMatchObject({
      id: 'id-1',
      path: '/Sales/Q#1 Orders'
    });
    await expect(client.getCatalogItem('/Sales/100% Done')).resolves.toMatchObject({ id: 'id-2' });
    expect(server.calls.map((call) => call.resource)).toEqual([
      "/CatalogItems(Path='/Sales/Q#1 Orders')",
      "/CatalogItems(Path='/Sales/100% Done')"
    ]);
  });

  test('maps HTTP failures to error codes with the server message', async () => {
    const server = new FakeReportServer();
    server.seed('/Sales', 'Folder');
    server.failNext('POST', /^\/Reports$/, 403, 'Access denied');
    const client = makeClient(server.fetchImpl);

    await expect(client.createReport('/Sales', 'Orders', '<Report />')).rejects.toMatchObject({
      code: 'AUTH',
      statusCode: 403,
      message: 'HTTP 403 for /reports/api/v2.0/Reports: Access denied'
    });
    await expect(client.createFolder('/', 'Sales')).rejects.toMatchObject({
      code: 'CONFLICT',
      statusCode: 409
    });
    await expect(client.updateReport('id-404', '<Report />')).rejects.toMatchObject({
      code: 'NOT_FOUND',
      statusCode: 404
    });
  });

  test('retries reads that fail with a server error', async () => {
    const server = new FakeReportServer();
    server.failNext('GET', /^\/System$/, 503, 'Service unavailable', 2);
    const logger = makeLogger();
    const client = makeClient(server.fetchImpl, {
      readRetries: 2,
      logger: logger as ReportServerClientOptions['logger']
    });

    await expect(client.getSystemInfo()).resolves.toMatchObject({ productVersion: '15.0.1102.1075' });
    expect(server.callsTo('GET', /^\/System$/)).toHaveLength(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  test('gives up on reads once retries are exhausted', async () => {
    const server = new FakeReportServer();
    server.failNext('GET', /^\/System$/, 500, 'Internal error', 5);
    const client = makeClient(server.fetchImpl, { readRetries: 1 });

    await expect(client.getSystemInfo()).rejects.toMatchObject({ code: 'SERVER_ERROR', statusCode: 500 });
    expect(server.callsTo('GET', /^\/System$/)).toHaveLength(2);
  });

  test('never retries writes', async () => {
    const server = new FakeReportServer();
    server.failNext('POST', /^\/Folders$/, 500, 'Internal error');
    const client = makeClient(server.fetchImpl, { readRetries: 3 });

    await expect(client.createFolder('/', 'Sales')).rejects.toMatchObject({ code: 'SERVER_ERROR' });
    expect(server.callsTo('POST')).toHaveLength(1);
  });

  test('aborts requests that exceed the timeout', async () => {
    const fetchMock = vi.fn(
      (_input: URL, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const error = new Error('This operation was aborted');
            error.name = 'AbortError';
            reject(error);
          });
        })
    ) as unknown as typeof fetch;
    const client = makeClient(fetchMock, { timeoutMs: 20 });

    await expect(client.getSystemInfo()).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Request timed out for /reports/api/v2.0/System'
    });
  });

  test('reports network failures', async () => {
    const fetchMock = vi.fn(async () => {
      throw new TypeError('fetch failed');
    }) as unknown as typeof fetch;
    const client = makeClient(fetchMock);

    await expect(client.getSystemInfo()).rejects.toMatchObject({
      code: 'NETWORK',
      message: 'Network failure for /reports/api/v2.0/System'
    });
  });

  test('uploads definitions as base64 content', async () => {
    const server = new FakeReportServer();
    const client = makeClient(server.fetchImpl);

    const item = await client.createReport('/Sales', 'Orders', '<Report />');

    expect(item).toEqual({ id: 'id-1', name: 'Orders', path: '/Sales/Orders', type: 'Report' });
    expect(server.calls[0]?.body).toEqual({
      '@odata.type': '#Model.Report',
      Name: 'Orders',
      Path: '/Sales/Orders',
      Content: 'PFJlcG9ydCAvPg==',
      ContentType: ''
    });
    expect(server.contents.get('id-1')).toBe('PFJlcG9ydCAvPg==');
  });

  test('binds report references by catalog path', async () => {
    const server = new FakeReportServer();
    const report = server.seed('/Sales/Orders', 'Report');
    const client = makeClient(server.fetchImpl);

    await client.setReportDataSources(report.Id, [{ name: 'SalesDb', path: 'Data Sources/SalesDb' }]);
    await client.setReportSharedDataSets(report.Id, [{ name: 'OrdersData', path: '/Datasets/Orders' }]);

    expect(server.writes()).toEqual(['PUT /Reports(id-1)/DataSources', 'PUT /Reports(id-1)/SharedDataSets']);
    expect(server.calls[0]?.body).toEqual([{ Name: 'SalesDb', IsReference: true, Path: '/Data Sources/SalesDb' }]);
    expect(server.calls[1]?.body).toEqual([{ Name: 'OrdersData', Path: '/Datasets/Orders' }]);
  });

  test('updates dataset content and deletes items by id', async () => {
    const server = new FakeReportServer();
    const dataSet = server.seed('/Datasets/Orders', 'DataSet');
    const client = makeClient(server.fetchImpl);

    await client.updateDataSet(dataSet.Id, '<SharedDataSet />');
    await client.deleteCatalogItem(dataSet.Id);

    expect(server.writes()).toEqual(['PATCH /DataSets(id-1)', 'DELETE /CatalogItems(id-1)']);
    expect(server.calls[0]?.body).toEqual({
      '@odata.type': '#Model.DataSet',
      Content: Buffer.from('<SharedDataSet />').toString('base64')
    });
    await expect(client.getCatalogItem('/Datasets/Orders')).resolves.toBeNull();
  });

  test('redacts connection strings and credentials from debug logs', async () => {
    const server = new FakeReportServer();
    const logger = makeLogger();
    const client = makeClient(server.fetchImpl, { logger: logger as ReportServerClientOptions['logger'] });

    await client.createDataSource({
      name: 'SalesDb',
      parentPath: '/Data Sources',
      extension: 'SQL',
      connectionString: 'Data Source=db01;Initial Catalog=Sales',
      credentialRetrieval: 'Store',
      credentials: { userName: 'report_reader', password: 'test-secret' }
    });

    const logPayload = logger.debug.mock.calls[0]?.[0] as { body: Record<string, unknown> };
    expect(logPayload.body).toMatchObject({
      Name: 'SalesDb',
      ConnectionString: '[REDACTED]',
      CredentialsByUser: '[REDACTED]',
      CredentialRetrieval: 'Store'
    });
    expect(server.calls[0]?.body).toMatchObject({
      ConnectionString: 'Data Source=db01;Initial Catalog=Sales',
      CredentialsByUser: { UserName: 'report_reader', Password: 'test-secret', UseAsWindowsCredentials: false }
    });
  });
});
