const INTERNER_STATS_ENV = "LOCUS_INTERNER_STATS";

export type InternerCounters = Map<string, number>;

export type InternerStatsSummary = {
  context: string;
  size: number;
  counters: Readonly<Record<string, number>>;
};

const readStatsEnv = (): string | undefined => {
  const processValue = (globalThis as {
    process?: { env?: Record<string, string | undefined> };
  }).process;
  return processValue?.env?.[INTERNER_STATS_ENV];
};

/** Read on every call so that a context created later sees a changed environment. */
export const isInternerStatsEnabled = (): boolean => {
  const raw = readStatsEnv();
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

export const incrementInternerCounter = (
  counters: InternerCounters,
  name: string,
): void => {
  counters.set(name, (counters.get(name) ?? 0) + 1);
};

export const toSortedRecord = (
  entries: ReadonlyMap<string, number>,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) =>
      left.localeCompare(right),
    ),
  );

export const logInternerStats = (summary: InternerStatsSummary): void => {
  console.error(`[locus:interner:stats] ${JSON.stringify(summary)}`);
};
