import {
  parseSkillPlanText,
  type SkillRequest,
  type SkillTree,
  type TrainedLevels,
} from "@skillqueue/skill-data";
import { describeSteps, summarizePlan } from "../analytics/planSummary";
import type {
  NamedTrainingStep,
  RequestFailure,
  ResolutionWarning,
  SkillPlanSummary,
} from "../domain/models";
import type { Logger } from "../logger";
import { QueueResolver } from "../planner/queueResolver";

export interface PlanSnapshot {
  steps: NamedTrainingStep[];
  summary: SkillPlanSummary[];
  warnings: ResolutionWarning[];
  failures: RequestFailure[];
  parseErrors: string[];
  notFoundSkills: string[];
  generatedAt: string;
}

export interface TrainingPlanServiceOptions {
  trainedLevels?: TrainedLevels;
  logger?: Logger;
  now?: () => Date;
}

/** Bulk import and repair of training plans over one skill tree. */
export class TrainingPlanService {
  private tree: SkillTree;
  private resolver: QueueResolver;
  private readonly options: TrainingPlanServiceOptions;

  constructor(tree: SkillTree, options: TrainingPlanServiceOptions = {}) {
    this.tree = tree;
    this.options = options;
    this.resolver = this.createResolver();
  }

  /** Replaces the skill data; depth caches of the old data are discarded. */
  public updateSkillTree(tree: SkillTree): void {
    this.tree = tree;
    this.resolver = this.createResolver();
  }

  public getResolver(): QueueResolver {
    return this.resolver;
  }

  public correct(requests: readonly SkillRequest[]): PlanSnapshot {
    return this.resolve(requests, [], []);
  }

  public importPlanText(text: string): PlanSnapshot {
    const parsed = parseSkillPlanText(text, this.tree);
    return this.resolve(parsed.requests, parsed.parseErrors, parsed.notFoundSkills);
  }

  private resolve(
    requests: readonly SkillRequest[],
    parseErrors: string[],
    notFoundSkills: string[]
  ): PlanSnapshot {
    const resolution = this.resolver.correctQueue(requests);
    const now = this.options.now ?? (() => new Date());
    return {
      steps: describeSteps(resolution.steps, this.resolver),
      summary: summarizePlan(resolution.steps),
      warnings: resolution.warnings,
      failures: resolution.failures,
      parseErrors,
      notFoundSkills,
      generatedAt: now().toISOString()
    };
  }

  private createResolver(): QueueResolver {
    return new QueueResolver({
      provider: this.tree,
      trainedLevels: this.options.trainedLevels,
      logger: this.options.logger
    });
  }
}
