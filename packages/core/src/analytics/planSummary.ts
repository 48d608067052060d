import type { SkillId } from "@skillqueue/skill-data";
import type {
  NamedTrainingStep,
  SkillPlanSummary,
  TrainingStep,
} from "../domain/models";

export interface SkillNamer {
  nameOf(skillId: SkillId): string;
}

export const describeSteps = (
  steps: readonly TrainingStep[],
  namer: SkillNamer
): NamedTrainingStep[] =>
  steps.map(step => ({
    skillId: step.skillId,
    skillName: namer.nameOf(step.skillId),
    level: step.level
  }));

/** One entry per skill, in the order each skill first appears in the plan. */
export const summarizePlan = (
  steps: readonly TrainingStep[]
): SkillPlanSummary[] => {
  const grouped = new Map<SkillId, SkillPlanSummary>();

  steps.forEach(step => {
    const existing = grouped.get(step.skillId);
    if (!existing) {
      grouped.set(step.skillId, {
        skillId: step.skillId,
        fromLevel: step.level,
        toLevel: step.level,
        stepCount: 1
      });
      return;
    }
    existing.fromLevel = Math.min(existing.fromLevel, step.level);
    existing.toLevel = Math.max(existing.toLevel, step.level);
    existing.stepCount += 1;
  });

  return Array.from(grouped.values());
};
