import {
  MAX_SKILL_LEVEL,
  type SkillId,
  type SkillLevel,
  type SkillRequirement,
} from "@skillqueue/skill-data";
import { CyclicDependencyError } from "./errors";
import type { TrainingStep } from "./models";

/** Direct prerequisites of a skill; unknown skills resolve to an empty list. */
export type RequirementLookup = (skillId: SkillId) => readonly SkillRequirement[];

export type DepthOf = (skillId: SkillId) => number;

const cycleFrom = (path: readonly SkillId[], repeated: SkillId): SkillId[] => [
  ...path.slice(path.indexOf(repeated)),
  repeated,
];

/**
 * Longest prerequisite chain beneath a skill. Results are memoized for the
 * lifetime of the calculator, so a calculator must not outlive the skill data
 * it was built over.
 */
export class DepthCalculator {
  private readonly lookup: RequirementLookup;
  private readonly cache = new Map<SkillId, number>();

  constructor(lookup: RequirementLookup) {
    this.lookup = lookup;
  }

  public depth(skillId: SkillId): number {
    return this.visit(skillId, [], new Set<SkillId>());
  }

  public get cachedCount(): number {
    return this.cache.size;
  }

  private visit(skillId: SkillId, path: SkillId[], stack: Set<SkillId>): number {
    const cached = this.cache.get(skillId);
    if (cached !== undefined) {
      return cached;
    }
    if (stack.has(skillId)) {
      throw new CyclicDependencyError(cycleFrom(path, skillId));
    }

    const requirements = this.lookup(skillId);
    let deepest = -1;
    if (requirements.length > 0) {
      path.push(skillId);
      stack.add(skillId);
      for (const requirement of requirements) {
        deepest = Math.max(deepest, this.visit(requirement.skillId, path, stack));
      }
      stack.delete(skillId);
      path.pop();
    }

    const depth = deepest + 1;
    this.cache.set(skillId, depth);
    return depth;
  }
}

export const ladder = (
  skillId: SkillId,
  fromLevel: SkillLevel,
  toLevel: SkillLevel
): TrainingStep[] => {
  const steps: TrainingStep[] = [];
  const top = Math.min(toLevel, MAX_SKILL_LEVEL);
  for (let level = Math.max(fromLevel, 1); level <= top; level += 1) {
    steps.push({ skillId, level });
  }
  return steps;
};

export class PrerequisiteExpander {
  private readonly lookup: RequirementLookup;

  constructor(lookup: RequirementLookup) {
    this.lookup = lookup;
  }

  /**
   * Every transitive prerequisite of `skillId`, mapped to the highest level
   * any path through the graph requires of it.
   */
  public collectAncestors(skillId: SkillId): Map<SkillId, SkillLevel> {
    const levels = new Map<SkillId, SkillLevel>();
    const finished = new Set<SkillId>();
    const path: SkillId[] = [];
    const stack = new Set<SkillId>();

    const walk = (current: SkillId) => {
      path.push(current);
      stack.add(current);
      for (const requirement of this.lookup(current)) {
        if (stack.has(requirement.skillId)) {
          throw new CyclicDependencyError(cycleFrom(path, requirement.skillId));
        }
        levels.set(
          requirement.skillId,
          Math.max(levels.get(requirement.skillId) ?? 0, requirement.level)
        );
        if (!finished.has(requirement.skillId)) {
          walk(requirement.skillId);
        }
      }
      stack.delete(current);
      path.pop();
      finished.add(current);
    };

    walk(skillId);
    return levels;
  }

  /** Full ladders (level 1 upward) of every transitive prerequisite. */
  public prerequisiteSteps(skillId: SkillId): TrainingStep[] {
    const steps: TrainingStep[] = [];
    this.collectAncestors(skillId).forEach((maxLevel, ancestorId) => {
      steps.push(...ladder(ancestorId, 1, maxLevel));
    });
    return steps;
  }

  public expand(
    skillId: SkillId,
    targetLevel: SkillLevel,
    startLevel: SkillLevel = 1
  ): TrainingStep[] {
    return [
      ...this.prerequisiteSteps(skillId),
      ...ladder(skillId, startLevel, targetLevel),
    ];
  }
}

/** Sorts by depth, then skill id, then level; prerequisites always precede dependents. */
export const orderSteps = (
  steps: readonly TrainingStep[],
  depthOf: DepthOf
): TrainingStep[] => {
  const depths = new Map<SkillId, number>();
  const depthFor = (skillId: SkillId): number => {
    const known = depths.get(skillId);
    if (known !== undefined) {
      return known;
    }
    const depth = depthOf(skillId);
    depths.set(skillId, depth);
    return depth;
  };

  return [...steps].sort((a, b) => {
    const depthDelta = depthFor(a.skillId) - depthFor(b.skillId);
    if (depthDelta !== 0) {
      return depthDelta;
    }
    if (a.skillId !== b.skillId) {
      return a.skillId - b.skillId;
    }
    return a.level - b.level;
  });
};
