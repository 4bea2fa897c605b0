import {
  customsCountryStatsTable,
  customsItemStatsTable,
  db,
  type DbTransaction,
  economicIndicatorsTable,
  type RankingIndexKind,
  socioeconomicRankingsTable,
  type TradeDirection,
  tradePartnerSharesTable,
} from '@statbridge/db';
import { eq } from 'drizzle-orm';
import { SinkError } from '../errors.js';

export type EconomicIndicatorInsert = typeof economicIndicatorsTable.$inferInsert;
export type TradePartnerShareInsert = typeof tradePartnerSharesTable.$inferInsert;
export type CustomsCountryStatInsert = typeof customsCountryStatsTable.$inferInsert;
export type CustomsItemStatInsert = typeof customsItemStatsTable.$inferInsert;
export type SocioeconomicRankingInsert = typeof socioeconomicRankingsTable.$inferInsert;

/** Every operation commits whole or not at all. */
export interface RecordSink<T> {
  readonly tableName: string;
  replaceAll(records: readonly T[]): Promise<number>;
  insert(records: readonly T[]): Promise<number>;
  deleteAll(): Promise<number>;
}

export interface IngestSinks {
  economicIndicators: RecordSink<EconomicIndicatorInsert>;
  tradePartnerShares: RecordSink<TradePartnerShareInsert>;
  customsCountryStats: RecordSink<CustomsCountryStatInsert>;
  /** Scoped to one direction; null covers the whole table. */
  customsItemStats(direction: TradeDirection | null): RecordSink<CustomsItemStatInsert>;
  socioeconomicRankings(kind: RankingIndexKind): RecordSink<SocioeconomicRankingInsert>;
}

export const SINK_BATCH_SIZE = 5000;

type SinkOps<T> = {
  insertBatch(tx: DbTransaction, batch: T[]): Promise<void>;
  /** Deletes the sink's scope and returns the affected row count. */
  deleteScope(tx: DbTransaction): Promise<number>;
};

export function createDrizzleSink<T>(
  tableName: string,
  ops: SinkOps<T>,
  batchSize = SINK_BATCH_SIZE
): RecordSink<T> {
  async function insertAll(tx: DbTransaction, records: readonly T[]) {
    for (let i = 0; i < records.length; i += batchSize) {
      await ops.insertBatch(tx, records.slice(i, i + batchSize));
    }
    return records.length;
  }

  async function guarded<R>(work: (tx: DbTransaction) => Promise<R>): Promise<R> {
    try {
      return await db.transaction(work);
    } catch (err) {
      throw new SinkError(tableName, { cause: err });
    }
  }

  return {
    tableName,
    replaceAll: (records) =>
      guarded(async (tx) => {
        await ops.deleteScope(tx);
        return insertAll(tx, records);
      }),
    insert: (records) => guarded((tx) => insertAll(tx, records)),
    deleteAll: () => guarded((tx) => ops.deleteScope(tx)),
  };
}

export const drizzleSinks: IngestSinks = {
  economicIndicators: createDrizzleSink<EconomicIndicatorInsert>('economic_indicators', {
    insertBatch: async (tx, batch) => {
      await tx.insert(economicIndicatorsTable).values(batch);
    },
    deleteScope: async (tx) => (await tx.delete(economicIndicatorsTable)).rowCount ?? 0,
  }),

  tradePartnerShares: createDrizzleSink<TradePartnerShareInsert>('trade_partner_shares', {
    insertBatch: async (tx, batch) => {
      await tx.insert(tradePartnerSharesTable).values(batch);
    },
    deleteScope: async (tx) => (await tx.delete(tradePartnerSharesTable)).rowCount ?? 0,
  }),

  customsCountryStats: createDrizzleSink<CustomsCountryStatInsert>('customs_country_stats', {
    insertBatch: async (tx, batch) => {
      await tx.insert(customsCountryStatsTable).values(batch);
    },
    deleteScope: async (tx) => (await tx.delete(customsCountryStatsTable)).rowCount ?? 0,
  }),

  customsItemStats: (direction) =>
    createDrizzleSink<CustomsItemStatInsert>('customs_item_stats', {
      insertBatch: async (tx, batch) => {
        await tx.insert(customsItemStatsTable).values(batch);
      },
      deleteScope: async (tx) => {
        const res = direction
          ? await tx.delete(customsItemStatsTable).where(eq(customsItemStatsTable.direction, direction))
          : await tx.delete(customsItemStatsTable);
        return res.rowCount ?? 0;
      },
    }),

  socioeconomicRankings: (kind) =>
    createDrizzleSink<SocioeconomicRankingInsert>('socioeconomic_rankings', {
      insertBatch: async (tx, batch) => {
        await tx.insert(socioeconomicRankingsTable).values(batch);
      },
      deleteScope: async (tx) =>
        (
          await tx
            .delete(socioeconomicRankingsTable)
            .where(eq(socioeconomicRankingsTable.indexKind, kind))
        ).rowCount ?? 0,
    }),
};
