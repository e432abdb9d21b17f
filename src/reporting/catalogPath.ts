export function catalogPathSegments(path: string): string[] {
  return path
    .split('/')
    .map((segment) => segment.trim())
    .filter(Boolean);
}

export function normalizeCatalogPath(raw: string | undefined): string {
  if (!raw) {
    return '/';
  }
  const segments = catalogPathSegments(raw.replace(/\\/g, '/'));
  return segments.length ? `/${segments.join('/')}` : '/';
}

export function joinCatalogPath(parent: string, name: string): string {
  const base = normalizeCatalogPath(parent);
  const leaf = name.trim();
  return base === '/' ? `/${leaf}` : `${base}/${leaf}`;
}

/**
 * Project files target the SOAP web service (`.../ReportServer`), while the REST API
 * lives under the portal (`.../Reports`).
 */
export function toPortalUrl(targetServerUrl: string): string {
  const trimmed = targetServerUrl.trim().replace(/\/+$/, '');
  return trimmed.replace(/\/ReportServer(_[A-Za-z0-9]+)?$/i, (_match, instance: string | undefined) => `/Reports${instance ?? ''}`);
}
