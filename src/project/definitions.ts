import { DeployError } from '../errors.js';
import { attribute, child, children, childText, parseXmlBoolean, parseXmlDocument, requireRoot } from './xml.js';

export interface DataSourceDefinitionFile {
  name: string;
  extension: string;
  connectString: string;
  integratedSecurity: boolean;
  prompt?: string;
}

export interface SharedDataSetDefinitionFile {
  name: string;
  dataSourceReference?: string;
}

export interface ReportReference {
  /** Name the report uses internally. */
  name: string;
  /** Name of the shared item it points at. */
  reference: string;
}

export interface ReportReferences {
  dataSources: ReportReference[];
  sharedDataSets: ReportReference[];
}

export function parseDataSourceDefinition(xml: string, source = 'data source'): DataSourceDefinitionFile {
  const root = requireRoot(parseXmlDocument(xml, source), 'RptDataSource', source);
  const props = child(root, 'ConnectionProperties');
  const name = attribute(root, 'Name');
  const extension = childText(props, 'Extension');

  if (!name || !extension) {
    throw new DeployError('INVALID_PROJECT', `${source} is missing its Name attribute or connection Extension`, {
      details: { source }
    });
  }

  return {
    name,
    extension,
    connectString: childText(props, 'ConnectString') ?? '',
    integratedSecurity: parseXmlBoolean(childText(props, 'IntegratedSecurity')),
    prompt: childText(props, 'Prompt')
  };
}

export function parseSharedDataSetDefinition(xml: string, source = 'shared dataset'): SharedDataSetDefinitionFile {
  const root = requireRoot(parseXmlDocument(xml, source), 'SharedDataSet', source);
  const dataSet = child(root, 'DataSet');
  if (!dataSet) {
    throw new DeployError('INVALID_PROJECT', `${source} has no <DataSet> element`, { details: { source } });
  }

  return {
    name: attribute(dataSet, 'Name') ?? '',
    dataSourceReference: childText(child(dataSet, 'Query'), 'DataSourceReference')
  };
}

export function parseReportReferences(xml: string, source = 'report'): ReportReferences {
  const root = requireRoot(parseXmlDocument(xml, source), 'Report', source);

  const dataSources = children(child(root, 'DataSources'), 'DataSource').flatMap((node) => {
    const name = attribute(node, 'Name');
    const reference = childText(node, 'DataSourceReference');
    return name && reference ? [{ name, reference }] : [];
  });

  const sharedDataSets = children(child(root, 'DataSets'), 'DataSet').flatMap((node) => {
    const name = attribute(node, 'Name');
    const reference = childText(child(node, 'SharedDataSet'), 'SharedDataSetReference');
    return name && reference ? [{ name, reference }] : [];
  });

  return { dataSources, sharedDataSets };
}
