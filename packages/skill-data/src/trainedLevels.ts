import { parseCsvRecords } from "./csv";
import type { SkillId, SkillLevel } from "./types";
import { isSkillLevel } from "./types";

const toInteger = (value: string | undefined): number | undefined => {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
};

/** Reads `skillId,trainedLevel` rows into a per-character level map. */
export const parseTrainedLevelsCsv = (text: string): Map<SkillId, SkillLevel> => {
  const levels = new Map<SkillId, SkillLevel>();

  parseCsvRecords(text).forEach((row, index) => {
    const rowNumber = index + 2;
    const skillId = toInteger(row.skillId);
    const level = toInteger(row.trainedLevel);
    if (skillId === undefined) {
      throw new Error(`Trained levels row ${rowNumber} has no valid skillId.`);
    }
    if (level === undefined || !isSkillLevel(level)) {
      throw new Error(
        `Trained level for skill ${skillId} on row ${rowNumber} must be between 0 and 5.`
      );
    }
    levels.set(skillId, Math.max(levels.get(skillId) ?? 0, level));
  });

  return levels;
};
