import type { SkillId, SkillLevel } from "@skillqueue/skill-data";
import { stepKey, type SessionSnapshot, type TrainingStep } from "../domain/models";

/**
 * Bookkeeping for one planning session: which skills were touched, the highest
 * level planned per skill, and every step already handed out.
 */
export interface TrainingSession {
  addedSkills: Set<SkillId>;
  sessionLevels: Map<SkillId, SkillLevel>;
  emittedSteps: Set<string>;
  emittedOrder: TrainingStep[];
}

export const createSession = (): TrainingSession => ({
  addedSkills: new Set(),
  sessionLevels: new Map(),
  emittedSteps: new Set(),
  emittedOrder: [],
});

export interface CommitOutcome {
  added: TrainingStep[];
  skipped: number;
}

/**
 * Records `candidates` in the session and returns the ones not emitted
 * before, in candidate order.
 */
export const commitSteps = (
  session: TrainingSession,
  candidates: readonly TrainingStep[]
): CommitOutcome => {
  const added: TrainingStep[] = [];
  let skipped = 0;

  for (const step of candidates) {
    session.addedSkills.add(step.skillId);
    session.sessionLevels.set(
      step.skillId,
      Math.max(session.sessionLevels.get(step.skillId) ?? 0, step.level)
    );

    const key = stepKey(step);
    if (session.emittedSteps.has(key)) {
      skipped += 1;
      continue;
    }
    session.emittedSteps.add(key);
    const emitted = { skillId: step.skillId, level: step.level };
    session.emittedOrder.push(emitted);
    added.push(emitted);
  }

  return { added, skipped };
};

export const snapshotSession = (session: TrainingSession): SessionSnapshot => {
  const sessionLevels: Record<SkillId, SkillLevel> = {};
  session.sessionLevels.forEach((level, skillId) => {
    sessionLevels[skillId] = level;
  });
  return {
    addedSkills: Array.from(session.addedSkills).sort((a, b) => a - b),
    sessionLevels,
    emittedSteps: session.emittedOrder.map((step) => ({ ...step })),
  };
};
