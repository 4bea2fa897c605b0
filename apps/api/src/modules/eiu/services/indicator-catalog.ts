export type IndicatorCatalogEntry = Readonly<{ code: string; title: string }>;

/** Indicator codes tracked per country; sheets may carry more rows than this. */
export const INDICATOR_CATALOG: readonly IndicatorCatalogEntry[] = Object.freeze([
  { code: 'PSBR', title: 'Budget balance (% of GDP)' },
  { code: 'DCPI', title: 'Consumer prices (% change pa; av)' },
  { code: 'CARA', title: 'Current-account balance/GDP' },
  { code: 'BALC', title: 'Current-account balance (US$)' },
  { code: 'XRPD', title: 'Exchange rate LCU:US$ (av)' },
  { code: 'XPP1', title: 'Main destination of exports 1 (% share)' },
  { code: 'XPP2', title: 'Main destination of exports 2 (% share)' },
  { code: 'XPP3', title: 'Main destination of exports 3 (% share)' },
  { code: 'XPP4', title: 'Main destination of exports 4 (% share)' },
  { code: 'FRES', title: 'Foreign-exchange reserves excl gold (US$)' },
  { code: 'MEXP', title: 'Goods: exports fob (US$)' },
  { code: 'MIMP', title: 'Goods: imports fob (US$)' },
  { code: 'MPP1', title: 'Main origin of imports 1 (% share)' },
  { code: 'MPP2', title: 'Main origin of imports 2 (% share)' },
  { code: 'MPP3', title: 'Main origin of imports 3 (% share)' },
  { code: 'PUDP', title: 'Public debt (% of GDP)' },
  { code: 'DGDP', title: 'Real GDP growth (%)' },
  { code: 'TDPY', title: 'Total debt service paid (US$)' },
  { code: 'BALM', title: 'Trade balance (US$)' },
]);

export type IndicatorField =
  | 'title'
  | 'code'
  | 'currency'
  | 'units'
  | 'source'
  | 'definition'
  | 'note'
  | 'published';

/** Sheet column name → record field. */
export const INDICATOR_COLUMN_FIELDS: Readonly<Record<string, IndicatorField>> = {
  Series: 'title',
  Code: 'code',
  Currency: 'currency',
  Units: 'units',
  Source: 'source',
  Definition: 'definition',
  Note: 'note',
  Published: 'published',
};
