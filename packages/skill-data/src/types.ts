export type SkillId = number;

/** 0 means untrained; trainable target levels run from 1 to 5. */
export type SkillLevel = number;

export const MIN_TRAINABLE_LEVEL = 1;
export const MAX_SKILL_LEVEL = 5;

export interface SkillRequirement {
  skillId: SkillId;
  level: SkillLevel;
}

export interface SkillRecord {
  skillId: SkillId;
  name: string;
  requirements: SkillRequirement[];
}

export interface SkillRequest {
  skillId: SkillId;
  level: SkillLevel;
}

/**
 * Source of direct prerequisites. `requirementsOf` returns one entry per
 * prerequisite skill at its highest required level, or `undefined` when the
 * skill is not known to the provider.
 */
export interface SkillRequirementProvider {
  requirementsOf(skillId: SkillId): readonly SkillRequirement[] | undefined;
  nameOf(skillId: SkillId): string | undefined;
}

export interface SkillNameLookup {
  findByName(name: string): SkillId | undefined;
}

export type TrainedLevels = ReadonlyMap<SkillId, SkillLevel>;

export interface SkillPlanParseResult {
  requests: SkillRequest[];
  parseErrors: string[];
  notFoundSkills: string[];
}

export const isTrainableLevel = (level: number): boolean =>
  Number.isInteger(level) &&
  level >= MIN_TRAINABLE_LEVEL &&
  level <= MAX_SKILL_LEVEL;

export const isSkillLevel = (level: number): boolean =>
  Number.isInteger(level) && level >= 0 && level <= MAX_SKILL_LEVEL;
