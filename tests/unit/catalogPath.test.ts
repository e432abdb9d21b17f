import { describe, expect, test } from 'vitest';

import {
  catalogPathSegments,
  joinCatalogPath,
  normalizeCatalogPath,
  toPortalUrl
} from '../../src/reporting/catalogPath.js';

describe('catalog paths', () => {
  test('normalizes separators, whitespace and empty input', () => {
    expect(normalizeCatalogPath('Sales//Monthly/')).toBe('/Sales/Monthly');
    expect(normalizeCatalogPath(' /Data Sources ')).toBe('/Data Sources');
    expect(normalizeCatalogPath('Finance\\Quarterly')).toBe('/Finance/Quarterly');
    expect(normalizeCatalogPath('')).toBe('/');
    expect(normalizeCatalogPath(undefined)).toBe('/');
  });

  test('joins and splits paths', () => {
    expect(joinCatalogPath('/', 'Sales')).toBe('/Sales');
    expect(joinCatalogPath('/Sales', 'Orders')).toBe('/Sales/Orders');
    expect(catalogPathSegments('/Sales/Orders')).toEqual(['Sales', 'Orders']);
  });

  test('maps web service URLs to the portal', () => {
    expect(toPortalUrl('http://rs01/ReportServer')).toBe('http://rs01/Reports');
    expect(toPortalUrl('http://rs01/ReportServer_SQL2019/')).toBe('http://rs01/Reports_SQL2019');
    expect(toPortalUrl('https://rs01.example.test/reports/')).toBe('https://rs01.example.test/reports');
  });
});
