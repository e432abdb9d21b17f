import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { DeployError } from '../errors.js';
import {
  attribute,
  child,
  children,
  childText,
  parseXmlBoolean,
  parseXmlDocument,
  requireRoot,
  textOf,
  type XmlNode
} from './xml.js';

export type ProjectLayout = 'legacy' | 'msbuild';
export type ProjectItemKind = 'dataSource' | 'dataSet' | 'report';

export interface ProjectItem {
  kind: ProjectItemKind;
  name: string;
  /** As listed in the project, relative to its directory. */
  fileName: string;
  /** Absolute path, set when the project was loaded from disk. */
  filePath?: string;
}

export interface ProjectConfiguration {
  name: string;
  targetServerUrl?: string;
  targetReportFolder?: string;
  targetDataSourceFolder?: string;
  targetDataSetFolder?: string;
  targetReportPartFolder?: string;
  overwriteDataSets: boolean;
  overwriteDataSources: boolean;
}

export interface ReportProject {
  layout: ProjectLayout;
  projectPath?: string;
  configuration: ProjectConfiguration;
  availableConfigurations: string[];
  dataSources: ProjectItem[];
  dataSets: ProjectItem[];
  reports: ProjectItem[];
}

type PropertyBag = Map<string, string>;

export function itemNameFromFile(fileName: string): string {
  const leaf = fileName.split(/[\\/]/).pop() ?? fileName;
  const dot = leaf.lastIndexOf('.');
  return dot > 0 ? leaf.slice(0, dot) : leaf;
}

function readProperties(node: XmlNode | undefined, into: PropertyBag = new Map()): PropertyBag {
  if (!node) {
    return into;
  }
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith('@_') || key === '#text') {
      continue;
    }
    const text = textOf(value);
    if (text !== undefined) {
      into.set(key, text);
    }
  }
  return into;
}

function toConfiguration(name: string, props: PropertyBag): ProjectConfiguration {
  const optional = (key: string): string | undefined => {
    const value = props.get(key)?.trim();
    return value ? value : undefined;
  };

  return {
    name,
    targetServerUrl: optional('TargetServerURL'),
    targetReportFolder: optional('TargetReportFolder') ?? optional('TargetFolder'),
    targetDataSourceFolder: optional('TargetDataSourceFolder'),
    targetDataSetFolder: optional('TargetDatasetFolder'),
    targetReportPartFolder: optional('TargetReportPartFolder'),
    overwriteDataSets: parseXmlBoolean(props.get('OverwriteDatasets')),
    overwriteDataSources: parseXmlBoolean(props.get('OverwriteDataSources'))
  };
}

function selectConfiguration(
  available: Array<{ name: string; props: PropertyBag }>,
  requested: string | undefined,
  source: string
): { name: string; props: PropertyBag } {
  const first = available[0];
  if (!first) {
    throw new DeployError('INVALID_PROJECT', `${source} declares no configurations`, { details: { source } });
  }

  if (!requested) {
    return first;
  }

  const wanted = requested.trim().toLowerCase();
  const match = available.find((entry) => entry.name.toLowerCase() === wanted);
  if (!match) {
    const names = available.map((entry) => entry.name);
    throw new DeployError(
      'INVALID_PROJECT',
      `Configuration "${requested}" not found in ${source}; available: ${names.join(', ')}`,
      { details: { source, requested, available: names } }
    );
  }
  return match;
}

function legacyItems(root: XmlNode, container: string, kind: ProjectItemKind): ProjectItem[] {
  return children(child(root, container), 'ProjectItem').flatMap((item) => {
    const fileName = childText(item, 'FullPath') ?? childText(item, 'Name');
    if (!fileName) {
      return [];
    }
    return [{ kind, name: itemNameFromFile(fileName), fileName }];
  });
}

function parseLegacyProject(root: XmlNode, requested: string | undefined, source: string): ReportProject {
  const available = children(child(root, 'Configurations'), 'Configuration').map((entry) => ({
    name: childText(entry, 'Name') ?? '',
    props: readProperties(child(entry, 'Options'))
  }));
  const selected = selectConfiguration(
    available.filter((entry) => entry.name),
    requested,
    source
  );

  return {
    layout: 'legacy',
    configuration: toConfiguration(selected.name, selected.props),
    availableConfigurations: available.map((entry) => entry.name).filter(Boolean),
    dataSources: legacyItems(root, 'DataSources', 'dataSource'),
    dataSets: legacyItems(root, 'DataSets', 'dataSet'),
    reports: legacyItems(root, 'Reports', 'report')
  };
}

/** `'$(Configuration)|$(Platform)' == 'Release|AnyCPU'` yields `Release`. */
export function configurationFromCondition(condition: string | undefined): string | undefined {
  if (!condition || !condition.includes('$(Configuration)')) {
    return undefined;
  }
  const match = condition.match(/==\s*'([^']*)'/);
  const name = match?.[1]?.split('|')[0]?.trim();
  return name ? name : undefined;
}

function parseMsBuildProject(root: XmlNode, requested: string | undefined, source: string): ReportProject {
  const shared: PropertyBag = new Map();
  const byName = new Map<string, PropertyBag>();

  for (const group of children(root, 'PropertyGroup')) {
    const condition = attribute(group, 'Condition');
    if (!condition) {
      readProperties(group, shared);
      continue;
    }
    const name = configurationFromCondition(condition);
    if (!name) {
      continue;
    }
    const existing = byName.get(name);
    byName.set(name, readProperties(group, existing));
  }

  const available = [...byName.entries()].map(([name, props]) => ({
    name,
    props: new Map([...shared, ...props])
  }));
  const selected = selectConfiguration(available, requested, source);

  const items = (element: string, kind: ProjectItemKind): ProjectItem[] =>
    children(root, 'ItemGroup')
      .flatMap((group) => children(group, element))
      .flatMap((item) => {
        const fileName = attribute(item, 'Include');
        return fileName ? [{ kind, name: itemNameFromFile(fileName), fileName }] : [];
      });

  return {
    layout: 'msbuild',
    configuration: toConfiguration(selected.name, selected.props),
    availableConfigurations: available.map((entry) => entry.name),
    dataSources: items('DataSource', 'dataSource'),
    dataSets: items('DataSet', 'dataSet'),
    reports: items('Report', 'report')
  };
}

export function parseReportProject(xml: string, configurationName?: string, source = 'report project'): ReportProject {
  const root = requireRoot(parseXmlDocument(xml, source), 'Project', source);

  if (child(root, 'Configurations')) {
    return parseLegacyProject(root, configurationName, source);
  }
  return parseMsBuildProject(root, configurationName, source);
}

export async function loadReportProject(projectPath: string, configurationName?: string): Promise<ReportProject> {
  const absolute = resolve(projectPath);
  let xml: string;
  try {
    xml = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new DeployError('INVALID_PROJECT', `Cannot read report project ${absolute}`, { cause: error });
  }

  const project = parseReportProject(xml, configurationName, absolute);
  const baseDir = dirname(absolute);
  const attach = (item: ProjectItem): ProjectItem => ({
    ...item,
    filePath: resolve(baseDir, item.fileName.replace(/\\/g, '/'))
  });

  return {
    ...project,
    projectPath: absolute,
    dataSources: project.dataSources.map(attach),
    dataSets: project.dataSets.map(attach),
    reports: project.reports.map(attach)
  };
}
