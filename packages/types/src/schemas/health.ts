import { z } from 'zod/v4';

export const HealthSchema = z.object({
  ok: z.boolean(),
  service: z.string().default('statbridge-api'),
  time: z.object({
    server: z.string(),
    uptimeSec: z.number(),
    tz: z.string(),
  }),
  db: z.object({
    ok: z.boolean(),
    latencyMs: z.number().nullable(),
  }),
  ingest: z.object({
    running: z.number().nullable(),
    failed24h: z.number().nullable(),
  }),
  version: z.object({
    commit: z.string().nullable(),
    env: z.string(),
  }),
  durationMs: z.number(),
});
