import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, test } from 'vitest';

import {
  parseDataSourceDefinition,
  parseReportReferences,
  parseSharedDataSetDefinition
} from '../../src/project/definitions.js';
import {
  configurationFromCondition,
  itemNameFromFile,
  loadReportProject,
  parseReportProject
} from '../../src/project/reportProject.js';

const fixtures = join(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');
const salesDir = join(fixtures, 'sales');
const financeDir = join(fixtures, 'finance');

function fixture(...parts: string[]): Promise<string> {
  return readFile(join(fixtures, ...parts), 'utf8');
}

describe('parseReportProject (legacy layout)', () => {
  test('selects a configuration by name, ignoring case', async () => {
    const project = parseReportProject(await fixture('sales', 'Sales.rptproj'), 'release');

    expect(project.layout).toBe('legacy');
    expect(project.availableConfigurations).toEqual(['Debug', 'Release']);
    expect(project.configuration).toEqual({
      name: 'Release',
      targetServerUrl: 'http://{{ReportHost}}/ReportServer',
      targetReportFolder: 'Sales',
      targetDataSourceFolder: 'Shared/Data Sources',
      targetDataSetFolder: 'Shared/Datasets',
      targetReportPartFolder: undefined,
      overwriteDataSets: false,
      overwriteDataSources: false
    });
  });

  test('defaults to the first configuration and falls back to TargetFolder', async () => {
    const project = parseReportProject(await fixture('sales', 'Sales.rptproj'));

    expect(project.configuration.name).toBe('Debug');
    expect(project.configuration.targetReportFolder).toBe('Sales Dev');
    expect(project.configuration.overwriteDataSets).toBe(true);
    expect(project.configuration.overwriteDataSources).toBe(true);
  });

  test('lists items in document order, named after their files', async () => {
    const project = parseReportProject(await fixture('sales', 'Sales.rptproj'));

    expect(project.dataSources).toEqual([{ kind: 'dataSource', name: 'SalesDb', fileName: 'SalesDb.rds' }]);
    expect(project.dataSets).toEqual([{ kind: 'dataSet', name: 'Orders', fileName: 'Orders.rsd' }]);
    expect(project.reports.map((item) => item.name)).toEqual(['OrdersSummary', 'Returns']);
  });

  test('names the available configurations when the requested one is missing', async () => {
    const xml = await fixture('sales', 'Sales.rptproj');

    expect(() => parseReportProject(xml, 'Staging')).toThrowError(
      'Configuration "Staging" not found in report project; available: Debug, Release'
    );
  });
});

describe('parseReportProject (MSBuild layout)', () => {
  test('merges unconditioned properties under the selected configuration', async () => {
    const project = parseReportProject(await fixture('finance', 'Finance.rptproj'), 'Release');

    expect(project.layout).toBe('msbuild');
    expect(project.availableConfigurations).toEqual(['Debug', 'Release']);
    expect(project.configuration).toEqual({
      name: 'Release',
      targetServerUrl: 'https://rs.example.test/ReportServer',
      targetReportFolder: 'Finance',
      targetDataSourceFolder: 'Finance/Shared Sources',
      targetDataSetFolder: undefined,
      targetReportPartFolder: undefined,
      overwriteDataSets: false,
      overwriteDataSources: true
    });
  });

  test('uses shared properties where a configuration does not override them', async () => {
    const project = parseReportProject(await fixture('finance', 'Finance.rptproj'));

    expect(project.configuration.name).toBe('Debug');
    expect(project.configuration.targetDataSourceFolder).toBe('Finance/Data Sources');
  });

  test('collects items from every item group', async () => {
    const project = parseReportProject(await fixture('finance', 'Finance.rptproj'));

    expect(project.reports).toEqual([
      { kind: 'report', name: 'Ledger', fileName: 'Reports\\Ledger.rdl' },
      { kind: 'report', name: 'Budget', fileName: 'Reports\\Budget.rdl' }
    ]);
    expect(project.dataSources.map((item) => item.name)).toEqual(['FinanceDb']);
    expect(project.dataSets.map((item) => item.name)).toEqual(['Accounts']);
  });

  test('reads the configuration name out of a condition', () => {
    expect(configurationFromCondition(" '$(Configuration)|$(Platform)' == 'Release|AnyCPU' ")).toBe('Release');
    expect(configurationFromCondition(" '$(Configuration)' == 'Debug' ")).toBe('Debug');
    expect(configurationFromCondition(" '$(Platform)' == 'x64' ")).toBeUndefined();
  });
});

describe('parseReportProject errors', () => {
  test('rejects XML that is not well formed', () => {
    expect(() => parseReportProject('<Project><Reports></Project>')).toThrowError(/^report project is not well-formed XML/);
  });

  test('rejects a document with another root element', () => {
    expect(() => parseReportProject('<Solution />')).toThrowError('report project is missing the <Project> root element');
  });

  test('rejects a project without configurations', () => {
    expect(() => parseReportProject('<Project><ItemGroup /></Project>')).toThrowError('report project declares no configurations');
  });
});

describe('loadReportProject', () => {
  test('attaches absolute file paths relative to the project', async () => {
    const project = await loadReportProject(join(salesDir, 'Sales.rptproj'), 'Release');

    expect(project.projectPath).toBe(join(salesDir, 'Sales.rptproj'));
    expect(project.dataSources[0]?.filePath).toBe(join(salesDir, 'SalesDb.rds'));
    expect(project.reports[1]?.filePath).toBe(join(salesDir, 'Returns.rdl'));
  });

  test('turns Windows separators into platform paths', async () => {
    const project = await loadReportProject(join(financeDir, 'Finance.rptproj'));

    expect(project.reports[0]?.filePath).toBe(join(financeDir, 'Reports', 'Ledger.rdl'));
  });

  test('reports a missing project file', async () => {
    await expect(loadReportProject(join(fixtures, 'missing.rptproj'))).rejects.toMatchObject({
      code: 'INVALID_PROJECT'
    });
  });
});

describe('definition files', () => {
  test('reads a shared data source', async () => {
    expect(parseDataSourceDefinition(await fixture('sales', 'SalesDb.rds'))).toEqual({
      name: 'SalesDb',
      extension: 'SQL',
      connectString: 'Data Source={{DbHost}};Initial Catalog=Sales',
      integratedSecurity: false,
      prompt: undefined
    });
  });

  test('reads integrated security and prompts', () => {
    const xml = `<RptDataSource Name="Warehouse">
      <ConnectionProperties>
        <Extension>OLEDB</Extension>
        <ConnectString>Provider=MSOLAP;Data Source=olap01</ConnectString>
        <IntegratedSecurity>true</IntegratedSecurity>
        <Prompt>Warehouse login</Prompt>
      </ConnectionProperties>
    </RptDataSource>`;

    expect(parseDataSourceDefinition(xml)).toEqual({
      name: 'Warehouse',
      extension: 'OLEDB',
      connectString: 'Provider=MSOLAP;Data Source=olap01',
      integratedSecurity: true,
      prompt: 'Warehouse login'
    });
  });

  test('rejects a data source without an extension', () => {
    expect(() => parseDataSourceDefinition('<RptDataSource Name="X"><ConnectionProperties /></RptDataSource>')).toThrowError(
      'data source is missing its Name attribute or connection Extension'
    );
  });

  test('reads the data source a shared dataset points at', async () => {
    expect(parseSharedDataSetDefinition(await fixture('sales', 'Orders.rsd'))).toEqual({
      name: 'Orders',
      dataSourceReference: 'SalesDb'
    });
  });

  test('reads only shared references from a report', async () => {
    expect(parseReportReferences(await fixture('sales', 'OrdersSummary.rdl'))).toEqual({
      dataSources: [{ name: 'SalesDb', reference: 'SalesDb' }],
      sharedDataSets: [{ name: 'OrdersData', reference: 'Orders' }]
    });
  });

  test('derives item names from project file entries', () => {
    expect(itemNameFromFile('Reports\\Ledger.rdl')).toBe('Ledger');
    expect(itemNameFromFile('nested/Sales.Summary.rdl')).toBe('Sales.Summary');
  });
});
