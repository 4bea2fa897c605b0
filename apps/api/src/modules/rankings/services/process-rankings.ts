import type { RankingIndexKind } from '@statbridge/db';
import { extname } from 'node:path';
import {
  DataValidationError,
  FileNotReadableError,
  IngestErrorCode,
} from '../../../lib/errors.js';
import type { SocioeconomicRankingInsert } from '../../../lib/ingest/sinks.js';
import type { PipelineContext, PipelineResult, Processor } from '../../../lib/ingest/types.js';
import { bridgeRows } from '../../../lib/tabular/country-bridge.js';
import {
  locateTabular,
  type RawRecord,
  readText,
  requireColumns,
  type Tabular,
  tableFromHeader,
} from '../../../lib/tabular/header-locator.js';
import type { RawTable } from '../../../lib/tabular/raw-table.js';
import { readWorkbook } from '../../../lib/tabular/read-workbook.js';
import { parseRank, parseScore, rankScores } from './rank-scores.js';
import { RANKING_SOURCES, type RankingSource } from './ranking-sources.js';

export const RANKINGS_TABLE = 'socioeconomic_rankings';

type RankedRow = { record: RawRecord; rank: number };

export function sourceTabular(sheet: RawTable, source: RankingSource): Tabular {
  if (source.header) return locateTabular(sheet, source.header);

  const skip = source.skipRows ?? 0;
  if (sheet.rows.length <= skip) {
    throw new DataValidationError('File ends before its header row.', { sheet: sheet.name, skip });
  }
  return tableFromHeader({ name: sheet.name, rows: sheet.rows.slice(skip) }, 0);
}

/** Rows carrying a rank, with score-based indices ranked here. */
export function rankRows(tabular: Tabular, source: RankingSource): RankedRow[] {
  const { column, from } = source.rank;

  if (from === 'rank') {
    const ranked: RankedRow[] = [];
    for (const record of tabular.rows) {
      const rank = parseRank(record[column]);
      if (rank !== null) ranked.push({ record, rank });
    }
    return ranked;
  }

  const scored: Array<{ record: RawRecord; score: number }> = [];
  for (const record of tabular.rows) {
    const score = parseScore(record[column]);
    if (score !== null) scored.push({ record, score });
  }
  const ranks = rankScores(scored.map((s) => s.score));
  return scored.map(({ record }, idx) => ({ record, rank: ranks[idx] ?? scored.length }));
}

export function createRankingProcessor(kind: RankingIndexKind): Processor {
  const source = RANKING_SOURCES[kind];

  return async (ctx: PipelineContext): Promise<PipelineResult> => {
    const ext = extname(ctx.filePath).toLowerCase();
    if (ext !== `.${source.format}`) {
      throw new FileNotReadableError(
        IngestErrorCode.FILE_EXTENSION,
        `${source.label} is published as .${source.format}, got "${ext || '(none)'}".`,
        { path: ctx.filePath }
      );
    }

    const [sheet] = await readWorkbook(ctx.filePath);
    if (!sheet) throw new DataValidationError('Workbook has no sheets.');

    const tabular = sourceTabular(sheet, source);
    requireColumns(tabular, [source.countryColumn, source.rank.column]);

    const [toCode, toName] = await Promise.all([
      source.bridge.toCode ? ctx.reference.lookup(source.bridge.toCode) : undefined,
      ctx.reference.lookup(source.bridge.toName),
    ]);

    const { rows, dropped } = bridgeRows(
      rankRows(tabular, source),
      ({ record }) => readText(record, source.countryColumn),
      { toCode, toName },
      ({ rank }, country): SocioeconomicRankingInsert => ({
        indexKind: kind,
        countryCode: country.code,
        countryName: country.name,
        rank,
      })
    );
    rows.sort((a, b) => a.rank - b.rank);

    ctx.log.info({ index: source.label, kept: rows.length, dropped }, 'ranking rows bridged');

    const count = await ctx.sinks.socioeconomicRankings(kind).replaceAll(rows);
    return {
      resultTable: RANKINGS_TABLE,
      count,
      dropped,
      csvRows: rows.map((row) => ({
        index_kind: row.indexKind,
        country_code: row.countryCode,
        country_name: row.countryName,
        rank: row.rank,
      })),
    };
  };
}
