import { DeployError } from '../errors.js';
import type { NamespaceSettings } from '../manifest/deployManifest.js';
import { expandTokens, type ResolvedTokens } from '../tokens/tokenResolver.js';

export type MailService = 'owa' | 'ecp' | 'ews' | 'activesync' | 'oab' | 'mapi' | 'powershell';

interface ServiceDescriptor {
  virtualDirectory: string;
  path: string;
  /** Remote PowerShell is reached over plain HTTP from inside the organisation. */
  internalHttp?: boolean;
}

const SERVICES: Record<MailService, ServiceDescriptor> = {
  owa: { virtualDirectory: 'owa (Default Web Site)', path: '/owa' },
  ecp: { virtualDirectory: 'ecp (Default Web Site)', path: '/ecp' },
  ews: { virtualDirectory: 'EWS (Default Web Site)', path: '/EWS/Exchange.asmx' },
  activesync: {
    virtualDirectory: 'Microsoft-Server-ActiveSync (Default Web Site)',
    path: '/Microsoft-Server-ActiveSync'
  },
  oab: { virtualDirectory: 'OAB (Default Web Site)', path: '/OAB' },
  mapi: { virtualDirectory: 'mapi (Default Web Site)', path: '/mapi' },
  powershell: { virtualDirectory: 'PowerShell (Default Web Site)', path: '/powershell', internalHttp: true }
};

export const MAIL_SERVICES: MailService[] = ['owa', 'ecp', 'ews', 'activesync', 'oab', 'mapi', 'powershell'];

export interface VirtualDirectoryPlan {
  service: MailService;
  identity: string;
  internalUrl: string;
  externalUrl: string | null;
}

export interface NamespacePlan {
  server: string;
  internalHost: string;
  externalHost: string | null;
  virtualDirectories: VirtualDirectoryPlan[];
  autodiscover: {
    identity: string;
    autoDiscoverServiceInternalUri: string;
  };
  outlookAnywhere: {
    identity: string;
    internalHostname: string;
    externalHostname: string | null;
    internalClientAuthenticationMethod: string;
    externalClientAuthenticationMethod: string;
    internalClientsRequireSsl: boolean;
    externalClientsRequireSsl: boolean;
  };
}

const HOST_LABEL = /^(?!-)[A-Za-z0-9-]{1,63}(?<!-)$/;

export function isValidHostName(host: string): boolean {
  if (!host || host.length > 253) {
    return false;
  }
  return host.split('.').every((label) => HOST_LABEL.test(label));
}

function isMailService(value: string): value is MailService {
  return Object.prototype.hasOwnProperty.call(SERVICES, value);
}

function requireHost(field: string, raw: string, resolved: ResolvedTokens): string {
  const host = expandTokens(raw, resolved).trim().toLowerCase();
  if (!isValidHostName(host)) {
    throw new DeployError('INVALID_MANIFEST', `namespaces.${field} "${host}" is not a valid host name`, {
      details: { field, host }
    });
  }
  return host;
}

function parentDomain(host: string): string {
  const labels = host.split('.');
  return labels.length > 2 ? labels.slice(1).join('.') : host;
}

function selectServices(requested: string[] | undefined, resolved: ResolvedTokens): MailService[] {
  if (!requested) {
    return MAIL_SERVICES;
  }
  const selected: MailService[] = [];
  for (const entry of requested) {
    const raw = expandTokens(entry, resolved);
    const name = raw.trim().toLowerCase();
    if (!isMailService(name)) {
      throw new DeployError(
        'INVALID_MANIFEST',
        `namespaces.services contains unknown service "${raw}"; known: ${MAIL_SERVICES.join(', ')}`,
        { details: { service: raw } }
      );
    }
    if (!selected.includes(name)) {
      selected.push(name);
    }
  }
  return selected;
}

export function buildNamespacePlan(settings: NamespaceSettings, resolved: ResolvedTokens): NamespacePlan {
  const server = expandTokens(settings.server, resolved).trim();
  const internalHost = requireHost('internalHost', settings.internalHost, resolved);
  const externalHost = settings.externalHost ? requireHost('externalHost', settings.externalHost, resolved) : null;
  const autodiscoverHost = settings.autodiscoverHost
    ? requireHost('autodiscoverHost', settings.autodiscoverHost, resolved)
    : `autodiscover.${parentDomain(internalHost)}`;
  const requireSsl = settings.requireSsl ?? true;

  const virtualDirectories = selectServices(settings.services, resolved).map((service): VirtualDirectoryPlan => {
    const descriptor = SERVICES[service];
    const internalScheme = descriptor.internalHttp ? 'http' : 'https';
    return {
      service,
      identity: `${server}\\${descriptor.virtualDirectory}`,
      internalUrl: `${internalScheme}://${internalHost}${descriptor.path}`,
      externalUrl: externalHost ? `https://${externalHost}${descriptor.path}` : null
    };
  });

  return {
    server,
    internalHost,
    externalHost,
    virtualDirectories,
    autodiscover: {
      identity: server,
      autoDiscoverServiceInternalUri: `https://${autodiscoverHost}/Autodiscover/Autodiscover.xml`
    },
    outlookAnywhere: {
      identity: `${server}\\Rpc (Default Web Site)`,
      internalHostname: internalHost,
      externalHostname: externalHost,
      internalClientAuthenticationMethod: expandTokens(settings.outlookAnywhere?.internalAuth ?? 'Ntlm', resolved),
      externalClientAuthenticationMethod: expandTokens(settings.outlookAnywhere?.externalAuth ?? 'Negotiate', resolved),
      internalClientsRequireSsl: requireSsl,
      externalClientsRequireSsl: requireSsl
    }
  };
}
