import type { CountryCodeMapping } from '../../../lib/tabular/country-bridge.js';
import { bridgeCountry, resolveCountry } from '../../../lib/tabular/country-bridge.js';
import type { TradeRelation } from './extract-trade-partners.js';

export type PartnerShare = { partner: string; rate: number };

export type CountryTradeProfile = {
  countryCode: string;
  exports: PartnerShare[];
  imports: PartnerShare[];
};

export type TradePartnerRow = {
  countryCode: string;
  countryName: string;
  /** Ordinal within the country; the residual row comes last. */
  position: number;
  exportPartner: string | null;
  exportRate: string | null;
  importPartner: string | null;
  importRate: string | null;
};

export type TradePartnerTables = {
  /** lower-case partner name → ISO code */
  partnerToCode: CountryCodeMapping;
  /** ISO code → target name; also names the reporting country */
  codeToName: CountryCodeMapping;
};

export const DEFAULT_RESIDUAL_LABEL = 'other';

/**
 * Group accepted relations by country code in first-seen order. Relations
 * without a partner or with a rate ≤ 0 carry no data and are skipped. Partner
 * order is insertion order, not magnitude.
 */
export function groupTradeProfiles(relations: readonly TradeRelation[]): CountryTradeProfile[] {
  const profiles = new Map<string, CountryTradeProfile>();

  for (const relation of relations) {
    if (relation.partner === null || !(relation.rate > 0)) continue;

    const countryCode = relation.countryCode.trim();
    let profile = profiles.get(countryCode);
    if (!profile) {
      profile = { countryCode, exports: [], imports: [] };
      profiles.set(countryCode, profile);
    }

    const share = { partner: relation.partner.trim().toLowerCase(), rate: relation.rate };
    if (relation.direction === 'export') profile.exports.push(share);
    else profile.imports.push(share);
  }

  return [...profiles.values()];
}

/** `40.000%`; zero renders as `0%`. */
export function formatRate(rate: number): string {
  return rate === 0 ? '0%' : `${rate.toFixed(3)}%`;
}

function sum(shares: readonly PartnerShare[]) {
  return shares.reduce((total, share) => total + share.rate, 0);
}

/**
 * Interleave each country's export and import partners position by position.
 * A direction with partners totalling under 100 gets one residual row with
 * `100 - total`; when both qualify they share that row.
 */
export function buildTradePartnerRows(
  profiles: readonly CountryTradeProfile[],
  tables: TradePartnerTables,
  residualLabel = DEFAULT_RESIDUAL_LABEL
): TradePartnerRow[] {
  const partnerName = (partner: string | undefined) =>
    bridgeCountry(partner, { toCode: tables.partnerToCode, toName: tables.codeToName })?.name ?? '';

  const out: TradePartnerRow[] = [];
  for (const profile of profiles) {
    const countryName = resolveCountry(profile.countryCode, { toName: tables.codeToName }) ?? '';
    const pairs = Math.max(profile.exports.length, profile.imports.length);

    for (let i = 0; i < pairs; i++) {
      const exp = profile.exports[i];
      const imp = profile.imports[i];
      out.push({
        countryCode: profile.countryCode,
        countryName,
        position: i + 1,
        exportPartner: partnerName(exp?.partner),
        exportRate: formatRate(exp?.rate ?? 0),
        importPartner: partnerName(imp?.partner),
        importRate: formatRate(imp?.rate ?? 0),
      });
    }

    const exportTotal = sum(profile.exports);
    const importTotal = sum(profile.imports);
    const exportResidual = profile.exports.length > 0 && exportTotal < 100;
    const importResidual = profile.imports.length > 0 && importTotal < 100;

    if (exportResidual || importResidual) {
      out.push({
        countryCode: profile.countryCode,
        countryName,
        position: pairs + 1,
        exportPartner: exportResidual ? residualLabel : null,
        exportRate: exportResidual ? formatRate(100 - exportTotal) : null,
        importPartner: importResidual ? residualLabel : null,
        importRate: importResidual ? formatRate(100 - importTotal) : null,
      });
    }
  }
  return out;
}
