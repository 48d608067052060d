import { parseCsv, trimEmptyRows } from "@skillqueue/skill-data";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

export interface ResolverConstants {
  /** Reuse prerequisite closures across requests of one batch. */
  cacheClosures: boolean;
  logLevel: LogLevel;
  /** Prefix of the display name given to skills the provider cannot name. */
  unknownSkillLabel: string;
}

export type ResolverConstantsUpdate = Partial<ResolverConstants>;

const INITIAL_RESOLVER_CONSTANTS: ResolverConstants = {
  cacheClosures: true,
  logLevel: "warn",
  unknownSkillLabel: "Unknown Skill",
};

let currentResolverConstants: ResolverConstants = {
  ...INITIAL_RESOLVER_CONSTANTS,
};

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const getResolverConstants = (): ResolverConstants => ({
  ...currentResolverConstants,
});

export const resetResolverConstants = (): ResolverConstants => {
  currentResolverConstants = { ...INITIAL_RESOLVER_CONSTANTS };
  return getResolverConstants();
};

export const updateResolverConstants = (
  updates: ResolverConstantsUpdate
): ResolverConstants => {
  if (updates.logLevel !== undefined && !isLogLevel(updates.logLevel)) {
    throw new Error(`Unknown log level "${updates.logLevel}".`);
  }
  if (
    updates.unknownSkillLabel !== undefined &&
    updates.unknownSkillLabel.trim().length === 0
  ) {
    throw new Error("Unknown skill label must not be empty.");
  }

  currentResolverConstants = {
    cacheClosures: updates.cacheClosures ?? currentResolverConstants.cacheClosures,
    logLevel: updates.logLevel ?? currentResolverConstants.logLevel,
    unknownSkillLabel:
      updates.unknownSkillLabel?.trim() ??
      currentResolverConstants.unknownSkillLabel,
  };
  return getResolverConstants();
};

const normalizeToken = (value: string): string =>
  value.toLowerCase().replace(/[^a-z0-9]/g, "");

const parseBooleanCell = (value: string, label: string): boolean => {
  switch (value.trim().toLowerCase()) {
    case "true":
    case "yes":
    case "1":
      return true;
    case "false":
    case "no":
    case "0":
      return false;
    default:
      throw new Error(`${label} must be true or false, got "${value}".`);
  }
};

export const parseResolverConstantsCsv = (
  csvText: string
): ResolverConstantsUpdate => {
  const rows = trimEmptyRows(parseCsv(csvText));
  if (rows.length === 0) {
    throw new Error("Constants CSV is empty.");
  }

  const [headerRaw, ...dataRows] = rows;
  const header = headerRaw.map((cell) => normalizeToken(cell));
  if (header[0] !== "category" || header[1] !== "key" || header[2] !== "value") {
    throw new Error(
      'Constants CSV header must start with "category,key,value" (case insensitive).'
    );
  }

  const updates: ResolverConstantsUpdate = {};

  dataRows.forEach((row, index) => {
    if (row.length < 3) {
      throw new Error(
        `Constants CSV row ${index + 2} must include category,key,value.`
      );
    }
    const [rawCategory, rawKey, rawValue] = row;
    const category = normalizeToken(rawCategory);
    const key = normalizeToken(rawKey);
    const value = rawValue.trim();

    switch (`${category}.${key}`) {
      case "resolver.cacheclosures":
        updates.cacheClosures = parseBooleanCell(value, "Cache closures");
        break;
      case "logging.level": {
        const level = value.toLowerCase();
        if (!isLogLevel(level)) {
          throw new Error(
            `Unknown log level "${rawValue}" on row ${index + 2}.`
          );
        }
        updates.logLevel = level;
        break;
      }
      case "names.unknownskill":
        updates.unknownSkillLabel = value;
        break;
      default:
        throw new Error(
          `Unknown constants entry "${rawCategory},${rawKey}" on row ${index + 2}.`
        );
    }
  });

  return updates;
};

export const applyResolverConstantsCsv = (csvText: string): ResolverConstants =>
  updateResolverConstants(parseResolverConstantsCsv(csvText));
