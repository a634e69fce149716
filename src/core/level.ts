/**
 * Severity levels, most severe first.
 * Lower numbers are more severe, so `Critical < Trace`.
 */
export enum Level {
  Critical = 1,
  Error = 2,
  Warning = 3,
  Info = 4,
  Debug = 5,
  Trace = 6,
}

export const ALL_LEVELS: readonly Level[] = [
  Level.Critical,
  Level.Error,
  Level.Warning,
  Level.Info,
  Level.Debug,
  Level.Trace,
];

const LEVEL_NAMES: Record<Level, string> = {
  [Level.Critical]: "critical",
  [Level.Error]: "error",
  [Level.Warning]: "warning",
  [Level.Info]: "info",
  [Level.Debug]: "debug",
  [Level.Trace]: "trace",
};

const LEVEL_LABELS: Record<Level, string> = {
  [Level.Critical]: "CRIT",
  [Level.Error]: "ERRO",
  [Level.Warning]: "WARN",
  [Level.Info]: "INFO",
  [Level.Debug]: "DEBG",
  [Level.Trace]: "TRCE",
};

const ALIASES: ReadonlyMap<string, Level> = new Map([
  ["crit", Level.Critical],
  ["err", Level.Error],
  ["warn", Level.Warning],
  ["dbg", Level.Debug],
  ["trc", Level.Trace],
]);

/** True when `level` is as severe as, or more severe than, `threshold`. */
export function isAtLeast(level: Level, threshold: Level): boolean {
  return level <= threshold;
}

export function levelName(level: Level): string {
  return LEVEL_NAMES[level];
}

/** Four-letter label, e.g. `"ERRO"`. */
export function levelLabel(level: Level): string {
  return LEVEL_LABELS[level];
}

export function levelShortLabel(level: Level): string {
  return LEVEL_LABELS[level].charAt(0);
}

export function levelFromNumber(n: number): Level | undefined {
  return ALL_LEVELS.find((level) => level === n);
}

/**
 * Parse a level from its name, its four-letter label or a common alias.
 * Case-insensitive; returns undefined for anything else.
 */
export function parseLevel(text: string): Level | undefined {
  const needle = text.trim().toLowerCase();
  for (const level of ALL_LEVELS) {
    if (LEVEL_NAMES[level] === needle || LEVEL_LABELS[level].toLowerCase() === needle) {
      return level;
    }
  }
  return ALIASES.get(needle);
}
