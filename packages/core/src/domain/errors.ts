import type { SkillId } from "@skillqueue/skill-data";

export type ResolverErrorCode = "INVALID_LEVEL" | "CYCLIC_DEPENDENCY";

export class ResolverError extends Error {
  public readonly code: ResolverErrorCode;

  constructor(code: ResolverErrorCode, message: string) {
    super(message);
    this.name = "ResolverError";
    this.code = code;
  }
}

export class InvalidLevelError extends ResolverError {
  public readonly skillId: SkillId;
  public readonly level: number;

  constructor(skillId: SkillId, level: number, expected: string) {
    super(
      "INVALID_LEVEL",
      `Invalid level ${level} for skill ${skillId}: expected ${expected}`
    );
    this.name = "InvalidLevelError";
    this.skillId = skillId;
    this.level = level;
  }
}

export class CyclicDependencyError extends ResolverError {
  /** Skill ids along the cycle; the first id is repeated at the end. */
  public readonly cycle: SkillId[];

  constructor(cycle: SkillId[]) {
    super(
      "CYCLIC_DEPENDENCY",
      `Cyclic prerequisite chain: ${cycle.join(" -> ")}`
    );
    this.name = "CyclicDependencyError";
    this.cycle = cycle;
  }
}
