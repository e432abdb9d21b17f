import { XMLParser, XMLValidator } from 'fast-xml-parser';

import { DeployError } from '../errors.js';

export type XmlNode = Record<string, unknown>;

// Elements that may repeat; fast-xml-parser collapses single occurrences otherwise.
const REPEATABLE_PATHS = new Set([
  'Project.Configurations.Configuration',
  'Project.DataSources.ProjectItem',
  'Project.DataSets.ProjectItem',
  'Project.Reports.ProjectItem',
  'Project.PropertyGroup',
  'Project.ItemGroup',
  'Project.ItemGroup.Report',
  'Project.ItemGroup.DataSource',
  'Project.ItemGroup.DataSet',
  'Report.DataSources.DataSource',
  'Report.DataSets.DataSet'
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (_tagName, jPath) => REPEATABLE_PATHS.has(jPath)
});

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseXmlDocument(xml: string, source: string): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new DeployError('INVALID_PROJECT', `${source} is not well-formed XML (line ${line}): ${msg}`, {
      details: { source, line }
    });
  }

  const parsed: unknown = parser.parse(xml);
  if (!isXmlNode(parsed)) {
    throw new DeployError('INVALID_PROJECT', `${source} has no root element`, { details: { source } });
  }
  return parsed;
}

export function requireRoot(doc: XmlNode, rootName: string, source: string): XmlNode {
  const root = doc[rootName];
  if (isXmlNode(root)) {
    return root;
  }
  if (root === '') {
    return {};
  }
  throw new DeployError('INVALID_PROJECT', `${source} is missing the <${rootName}> root element`, {
    details: { source, roots: Object.keys(doc) }
  });
}

export function child(node: XmlNode | undefined, name: string): XmlNode | undefined {
  const value = node?.[name];
  return isXmlNode(value) ? value : undefined;
}

export function children(node: XmlNode | undefined, name: string): XmlNode[] {
  const value = node?.[name];
  const list = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return list.filter(isXmlNode);
}

/** Text content of an element, whether or not it carries attributes. */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isXmlNode(value)) {
    return textOf(value['#text']);
  }
  return undefined;
}

export function childText(node: XmlNode | undefined, name: string): string | undefined {
  const text = textOf(node?.[name]);
  return text === undefined || text === '' ? undefined : text;
}

export function attribute(node: XmlNode | undefined, name: string): string | undefined {
  const value = node?.[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

export function parseXmlBoolean(raw: string | undefined): boolean {
  return raw?.trim().toLowerCase() === 'true';
}
