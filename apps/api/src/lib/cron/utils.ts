// ---- Flags parsing + typed accessors ---------------------------------------

export type Flags = Record<string, string>; // values are always strings

/** Parse --k=v and bare --k (as "true"). All values are strings. */
export function parseFlags(argv: string[] = []): Flags {
  const flags: Flags = {};
  for (const a of argv) {
    const m = /^--([^=]+)(?:=(.*))?$/.exec(a);
    const rawKey = m?.[1];
    if (!m || rawKey === undefined) continue;
    const key = rawKey.trim();
    const val = (m[2] ?? 'true').trim(); // bare --key => "true"
    if (key) flags[key] = val;
  }
  return flags;
}

/** Get a string flag (empty/whitespace → undefined). */
export function flagStr(flags: Flags, key: string): string | undefined {
  const v = flags[key];
  if (typeof v !== 'string') return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

/** Get a boolean flag. Accepts true/false/1/0/yes/no/on/off (case-insensitive). */
export function flagBool(flags: Flags, key: string): boolean {
  const v = flagStr(flags, key);
  if (v == null) return false;
  return /^(?:1|true|t|yes|y|on)$/i.test(v);
}

/** Get a number flag. Returns undefined if NaN. */
export function flagNum(flags: Flags, key: string): number | undefined {
  const s = flagStr(flags, key);
  if (s == null) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

/** A flag the command cannot run without. */
export function requireFlag(flags: Flags, key: string): string {
  const v = flagStr(flags, key);
  if (v === undefined) throw new Error(`Missing required flag --${key}`);
  return v;
}

/** Parse a flag through a zod-like parser; the message names the flag. */
export function flagAs<T>(
  flags: Flags,
  key: string,
  schema: { safeParse(v: unknown): { success: true; data: T } | { success: false } }
): T | undefined {
  const v = flagStr(flags, key);
  if (v === undefined) return undefined;
  const parsed = schema.safeParse(v);
  if (!parsed.success) throw new Error(`Invalid --${key}: ${v}`);
  return parsed.data;
}
