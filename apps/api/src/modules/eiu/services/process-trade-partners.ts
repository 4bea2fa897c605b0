import type { PipelineContext, PipelineResult } from '../../../lib/ingest/types.js';
import { readWorkbook } from '../../../lib/tabular/read-workbook.js';
import { buildTradePartnerRows, groupTradeProfiles } from './aggregate-trade-partners.js';
import { extractTradeRelations, isTradePartnerSheet } from './extract-trade-partners.js';

export const TRADE_PARTNERS_TABLE = 'trade_partner_shares';

export async function processTradePartners(ctx: PipelineContext): Promise<PipelineResult> {
  const tables = await readWorkbook(ctx.filePath, { include: isTradePartnerSheet });
  const relations = tables.flatMap((table) => extractTradeRelations(table));
  const profiles = groupTradeProfiles(relations);

  const [partnerToCode, codeToName] = await Promise.all([
    ctx.reference.lookup('partner-name-to-iso'),
    ctx.reference.lookup('iso-to-target-name'),
  ]);
  const rows = buildTradePartnerRows(
    profiles,
    { partnerToCode, codeToName },
    ctx.config.residualLabel
  );

  ctx.log.info(
    { sheets: tables.length, relations: relations.length, countries: profiles.length },
    'trade partners aggregated'
  );

  const count = await ctx.sinks.tradePartnerShares.replaceAll(rows);
  return {
    resultTable: TRADE_PARTNERS_TABLE,
    count,
    csvRows: rows.map((row) => ({
      country_code: row.countryCode,
      country_name: row.countryName,
      position: row.position,
      export_partner: row.exportPartner,
      export_rate: row.exportRate,
      import_partner: row.importPartner,
      import_rate: row.importRate,
    })),
  };
}
