import type { TradeDirection } from '@statbridge/db';
import { DataValidationError } from '../../../lib/errors.js';
import type { CustomsItemStatInsert } from '../../../lib/ingest/sinks.js';
import type { PipelineContext, PipelineResult } from '../../../lib/ingest/types.js';
import { bridgeRows } from '../../../lib/tabular/country-bridge.js';
import {
  readText,
  requireColumns,
  type Tabular,
} from '../../../lib/tabular/header-locator.js';
import { readTabular } from '../../../lib/tabular/read-workbook.js';
import { CATEGORY_RULES, normalizeCategories } from './category-normalizer.js';
import { CUSTOMS_HEADER } from './process-customs-countries.js';
import { extractYear, toAmount } from './customs-values.js';

export const CUSTOMS_ITEMS_TABLE = 'customs_item_stats';

export const ITEM_COLUMNS = {
  period: '기간',
  country: '국가',
  flag: '수출입구분',
  category: '성질명',
  weight: '중량',
  amount: '금액',
} as const;

/** How the source file spells each direction in its flag column. */
export const DIRECTION_LABELS: Readonly<Record<TradeDirection, string>> = {
  export: '수출',
  import: '수입',
};

/**
 * The file must carry the requested direction somewhere in its flag column.
 * Files without the column are not checked.
 */
export function validateDirection(tabular: Tabular, direction: TradeDirection): boolean {
  if (!tabular.columns.includes(ITEM_COLUMNS.flag)) return false;

  const label = DIRECTION_LABELS[direction];
  const values = new Set(
    tabular.rows.map((row) => readText(row, ITEM_COLUMNS.flag)).filter((v) => v !== '')
  );
  if (![...values].some((value) => value.includes(label))) {
    throw new DataValidationError('File direction does not match the requested direction.', {
      direction,
      found: [...values],
    });
  }
  return true;
}

export async function processCustomsItems(ctx: PipelineContext): Promise<PipelineResult> {
  const direction = ctx.params.direction;
  if (!direction) {
    throw new DataValidationError('A direction (export or import) is required for customs items.');
  }

  const tabular = await readTabular(ctx.filePath, CUSTOMS_HEADER);
  requireColumns(tabular, [
    ITEM_COLUMNS.period,
    ITEM_COLUMNS.country,
    ITEM_COLUMNS.category,
    ITEM_COLUMNS.weight,
    ITEM_COLUMNS.amount,
  ]);
  if (!validateDirection(tabular, direction)) {
    ctx.log.warn({ column: ITEM_COLUMNS.flag }, 'flag column absent; direction not verified');
  }

  const categorized = normalizeCategories(
    tabular.rows,
    (row) => readText(row, ITEM_COLUMNS.category),
    CATEGORY_RULES[direction]
  ).filter(({ row }) => extractYear(row[ITEM_COLUMNS.period]) !== null);

  const [toCode, toName] = await Promise.all([
    ctx.reference.lookup('customs-name-to-iso'),
    ctx.reference.lookup('iso-to-target-name'),
  ]);

  const { rows, dropped } = bridgeRows(
    categorized,
    ({ row }) => readText(row, ITEM_COLUMNS.country),
    { toCode, toName },
    ({ row, category }, country): CustomsItemStatInsert => ({
      year: extractYear(row[ITEM_COLUMNS.period]) ?? '',
      direction,
      nationCode: country.code,
      nationName: country.name,
      itemName: category,
      itemWeight: toAmount(row[ITEM_COLUMNS.weight], ITEM_COLUMNS.weight),
      itemAmount: toAmount(row[ITEM_COLUMNS.amount], ITEM_COLUMNS.amount),
    })
  );
  rows.sort(
    (a, b) => a.year.localeCompare(b.year) || Number(b.itemAmount) - Number(a.itemAmount)
  );

  ctx.log.info({ direction, kept: rows.length, dropped }, 'customs item rows normalized');

  const count = ctx.params.replaceAll
    ? await ctx.sinks.customsItemStats(null).replaceAll(rows)
    : await ctx.sinks.customsItemStats(direction).replaceAll(rows);

  return {
    resultTable: CUSTOMS_ITEMS_TABLE,
    count,
    dropped,
    csvRows: rows.map((row) => ({
      year: row.year,
      direction: row.direction,
      nation_code: row.nationCode,
      nation_name: row.nationName,
      item_name: row.itemName,
      item_weight: row.itemWeight,
      item_amount: row.itemAmount,
    })),
  };
}
