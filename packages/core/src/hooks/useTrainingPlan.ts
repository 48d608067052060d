import { useCallback, useMemo, useState } from "react";
import type {
  SkillId,
  SkillLevel,
  SkillRequest,
  SkillRequirementProvider,
  TrainedLevels
} from "@skillqueue/skill-data";
import { describeSteps } from "../analytics/planSummary";
import type {
  NamedTrainingStep,
  RequestFailure,
  ResolutionWarning,
  TrainingStep
} from "../domain/models";
import type { Logger } from "../logger";
import { QueueResolver } from "../planner/queueResolver";

export interface UseTrainingPlanArgs {
  tree: SkillRequirementProvider;
  trainedLevels?: TrainedLevels;
  logger?: Logger;
}

export interface UseTrainingPlanResult {
  steps: NamedTrainingStep[];
  warnings: ResolutionWarning[];
  failures: RequestFailure[];
  error: Error | null;
  addSkill: (skillId: SkillId, level: SkillLevel) => TrainingStep[];
  importQueue: (requests: readonly SkillRequest[]) => void;
  reset: () => void;
}

export const useTrainingPlan = ({
  tree,
  trainedLevels,
  logger
}: UseTrainingPlanArgs): UseTrainingPlanResult => {
  const resolver = useMemo(
    () => new QueueResolver({ provider: tree, trainedLevels, logger }),
    [tree, trainedLevels, logger]
  );
  const [plan, setPlan] = useState<{ owner: QueueResolver; steps: TrainingStep[] }>(
    () => ({ owner: resolver, steps: [] })
  );
  const [warnings, setWarnings] = useState<ResolutionWarning[]>([]);
  const [failures, setFailures] = useState<RequestFailure[]>([]);
  const [error, setError] = useState<Error | null>(null);

  // A new resolver means new skill data; steps planned against the old one are dropped.
  const steps = plan.owner === resolver ? plan.steps : [];

  const addSkill = useCallback(
    (skillId: SkillId, level: SkillLevel): TrainingStep[] => {
      try {
        const result = resolver.addSkillRequest(skillId, level);
        setPlan(previous => ({
          owner: resolver,
          steps: previous.owner === resolver
            ? [...previous.steps, ...result.steps]
            : result.steps
        }));
        setWarnings(result.warnings);
        setError(null);
        return result.steps;
      } catch (caught) {
        const failure = caught instanceof Error ? caught : new Error(String(caught));
        setError(failure);
        return [];
      }
    },
    [resolver]
  );

  const importQueue = useCallback(
    (requests: readonly SkillRequest[]) => {
      const result = resolver.correctQueue(requests);
      resolver.seedSession(result.steps);
      setPlan({ owner: resolver, steps: result.steps });
      setWarnings(result.warnings);
      setFailures(result.failures);
      setError(null);
    },
    [resolver]
  );

  const reset = useCallback(() => {
    resolver.resetSession();
    setPlan({ owner: resolver, steps: [] });
    setWarnings([]);
    setFailures([]);
    setError(null);
  }, [resolver]);

  const named = useMemo(() => describeSteps(steps, resolver), [steps, resolver]);

  return {
    steps: named,
    warnings,
    failures,
    error,
    addSkill,
    importQueue,
    reset
  };
};
