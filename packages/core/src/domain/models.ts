import type { SkillId, SkillLevel, SkillRequest } from "@skillqueue/skill-data";

export interface TrainingStep {
  skillId: SkillId;
  level: SkillLevel;
}

export interface NamedTrainingStep extends TrainingStep {
  skillName: string;
}

export type ResolutionWarningKind = "unknown-skill";

export interface ResolutionWarning {
  kind: ResolutionWarningKind;
  skillId: SkillId;
  message: string;
}

export interface ResolutionResult {
  steps: TrainingStep[];
  warnings: ResolutionWarning[];
}

export interface RequestFailure {
  index: number;
  request: SkillRequest;
  error: Error;
}

export interface BatchResolution extends ResolutionResult {
  failures: RequestFailure[];
}

export interface SessionSnapshot {
  addedSkills: SkillId[];
  sessionLevels: Record<SkillId, SkillLevel>;
  emittedSteps: TrainingStep[];
}

export interface SkillPlanSummary {
  skillId: SkillId;
  fromLevel: SkillLevel;
  toLevel: SkillLevel;
  stepCount: number;
}

export const stepKey = (step: TrainingStep): string =>
  `${step.skillId}_${step.level}`;
