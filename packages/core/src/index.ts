export * from "./domain/models";
export {
  ResolverError,
  InvalidLevelError,
  CyclicDependencyError
} from "./domain/errors";
export type { ResolverErrorCode } from "./domain/errors";
export {
  DepthCalculator,
  PrerequisiteExpander,
  ladder,
  orderSteps
} from "./domain/skillGraph";
export type { DepthOf, RequirementLookup } from "./domain/skillGraph";
export { QueueResolver } from "./planner/queueResolver";
export type { QueueResolverOptions } from "./planner/queueResolver";
export { createSession, commitSteps, snapshotSession } from "./planner/session";
export type { TrainingSession, CommitOutcome } from "./planner/session";
export {
  getResolverConstants,
  updateResolverConstants,
  resetResolverConstants,
  parseResolverConstantsCsv,
  applyResolverConstantsCsv,
  isLogLevel,
  LOG_LEVELS
} from "./constants";
export type {
  LogLevel,
  ResolverConstants,
  ResolverConstantsUpdate
} from "./constants";
export { createConsoleLogger, silentLogger } from "./logger";
export type { Logger } from "./logger";
export { describeSteps, summarizePlan } from "./analytics/planSummary";
export type { SkillNamer } from "./analytics/planSummary";
export { TrainingPlanService } from "./services/planService";
export type {
  PlanSnapshot,
  TrainingPlanServiceOptions
} from "./services/planService";
export { useTrainingPlan } from "./hooks/useTrainingPlan";
export type {
  UseTrainingPlanArgs,
  UseTrainingPlanResult
} from "./hooks/useTrainingPlan";
export { TrainingStepList, formatLevel } from "./components/TrainingStepList";
export type { TrainingStepListProps } from "./components/TrainingStepList";
