import {
  isSkillLevel,
  isTrainableLevel,
  type SkillId,
  type SkillLevel,
  type SkillRequest,
  type SkillRequirement,
  type SkillRequirementProvider,
  type TrainedLevels,
} from "@skillqueue/skill-data";
import { getResolverConstants } from "../constants";
import { InvalidLevelError, ResolverError } from "../domain/errors";
import type {
  BatchResolution,
  RequestFailure,
  ResolutionResult,
  ResolutionWarning,
  SessionSnapshot,
  TrainingStep,
} from "../domain/models";
import { stepKey } from "../domain/models";
import {
  DepthCalculator,
  PrerequisiteExpander,
  ladder,
  orderSteps,
  type RequirementLookup,
} from "../domain/skillGraph";
import { createConsoleLogger, type Logger } from "../logger";
import {
  commitSteps,
  createSession,
  snapshotSession,
  type TrainingSession,
} from "./session";

export interface QueueResolverOptions {
  provider: SkillRequirementProvider;
  /** The character's trained level per skill; used when no baseline is passed. */
  trainedLevels?: TrainedLevels;
  logger?: Logger;
  /** Defaults to the `cacheClosures` resolver constant. */
  cacheClosures?: boolean;
}

class WarningCollector {
  public readonly warnings: ResolutionWarning[] = [];
  private readonly seen = new Set<SkillId>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  public unknownSkill(skillId: SkillId, reason: string): void {
    if (this.seen.has(skillId)) {
      return;
    }
    this.seen.add(skillId);
    const message = `No requirement data for skill ${skillId} (${reason}); treating it as having no prerequisites`;
    this.warnings.push({ kind: "unknown-skill", skillId, message });
    this.logger.warn(message, { skillId });
  }
}

const assertTargetLevel = (skillId: SkillId, level: number): void => {
  if (!isTrainableLevel(level)) {
    throw new InvalidLevelError(skillId, level, "an integer from 1 to 5");
  }
};

const assertBaselineLevel = (skillId: SkillId, level: number): void => {
  if (!isSkillLevel(level)) {
    throw new InvalidLevelError(skillId, level, "an integer from 0 to 5");
  }
};

/**
 * Expands skill requests into ordered, deduplicated training steps.
 *
 * `addSkillRequest` accumulates a session across calls and hands out only the
 * steps it has not handed out before. `correctQueue` resolves a whole list
 * against a fresh batch-local session and leaves the interactive session
 * untouched.
 *
 * Instances are single-owner: calls must not interleave. Depths are memoized
 * per instance, so build a new resolver whenever the skill data changes.
 */
export class QueueResolver {
  private readonly provider: SkillRequirementProvider;
  private readonly trainedLevels: TrainedLevels;
  private readonly logger: Logger;
  private readonly cacheClosures: boolean;
  private readonly depths: DepthCalculator;
  private session: TrainingSession;

  constructor(options: QueueResolverOptions) {
    this.provider = options.provider;
    this.trainedLevels = options.trainedLevels ?? new Map();
    this.logger = options.logger ?? createConsoleLogger("queue-resolver");
    this.cacheClosures =
      options.cacheClosures ?? getResolverConstants().cacheClosures;
    this.depths = new DepthCalculator((skillId) => this.requirementsFor(skillId));
    this.session = createSession();
  }

  public addSkillRequest(
    skillId: SkillId,
    targetLevel: SkillLevel,
    baselineLevel?: SkillLevel
  ): ResolutionResult {
    assertTargetLevel(skillId, targetLevel);
    const baseline = baselineLevel ?? this.trainedLevels.get(skillId) ?? 0;
    assertBaselineLevel(skillId, baseline);

    this.logger.debug("Adding skill to plan", { skillId, targetLevel, baseline });
    const collector = new WarningCollector(this.logger);

    let candidates: TrainingStep[];
    if (!this.session.addedSkills.has(skillId)) {
      // First touch walks the whole ladder from level 1, whatever the baseline.
      const expander = this.expanderFor(collector);
      candidates = orderSteps(expander.expand(skillId, targetLevel, 1), this.depthOf);
    } else if (targetLevel > (this.session.sessionLevels.get(skillId) ?? 0)) {
      candidates = ladder(skillId, baseline + 1, targetLevel);
    } else {
      this.logger.debug("Skill already planned at or above target", {
        skillId,
        targetLevel,
      });
      return { steps: [], warnings: collector.warnings };
    }

    const { added, skipped } = commitSteps(this.session, candidates);
    this.session.sessionLevels.set(
      skillId,
      Math.max(this.session.sessionLevels.get(skillId) ?? 0, targetLevel)
    );
    this.session.addedSkills.add(skillId);

    this.logger.debug("Skill added to plan", {
      skillId,
      added: added.length,
      skipped,
    });
    return { steps: added, warnings: collector.warnings };
  }

  public correctQueue(requests: readonly SkillRequest[]): BatchResolution {
    const batch = createSession();
    const collector = new WarningCollector(this.logger);
    const expander = this.expanderFor(collector);
    const closures = new Map<SkillId, TrainingStep[]>();
    const steps: TrainingStep[] = [];
    const failures: RequestFailure[] = [];

    const prerequisitesOf = (skillId: SkillId): TrainingStep[] => {
      if (!this.cacheClosures) {
        return expander.prerequisiteSteps(skillId);
      }
      const cached = closures.get(skillId);
      if (cached) {
        return cached;
      }
      const computed = expander.prerequisiteSteps(skillId);
      closures.set(skillId, computed);
      return computed;
    };

    this.logger.debug("Correcting skill queue", { requests: requests.length });

    requests.forEach((request, index) => {
      try {
        assertTargetLevel(request.skillId, request.level);
        const ordered = orderSteps(
          [
            ...prerequisitesOf(request.skillId),
            ...ladder(request.skillId, 1, request.level),
          ],
          this.depthOf
        );
        const { added, skipped } = commitSteps(batch, ordered);
        steps.push(...added);
        this.logger.debug(`Request ${index + 1} resolved`, {
          skillId: request.skillId,
          added: added.length,
          skipped,
        });
      } catch (error) {
        if (!(error instanceof ResolverError)) {
          throw error;
        }
        failures.push({ index, request: { ...request }, error });
        this.logger.warn(`Request ${index + 1} skipped: ${error.message}`, {
          skillId: request.skillId,
          code: error.code,
        });
      }
    });

    this.logger.debug("Skill queue corrected", {
      steps: steps.length,
      failures: failures.length,
    });
    return { steps, warnings: collector.warnings, failures };
  }

  public getSessionLevel(skillId: SkillId): SkillLevel | undefined {
    return this.session.sessionLevels.get(skillId);
  }

  public hasEmitted(step: TrainingStep): boolean {
    return this.session.emittedSteps.has(stepKey(step));
  }

  public snapshotSession(): SessionSnapshot {
    return snapshotSession(this.session);
  }

  public resetSession(): void {
    this.session = createSession();
  }

  /**
   * Starts a new session from an existing plan, e.g. one produced by
   * `correctQueue`, so that later requests only add what the plan lacks.
   */
  public seedSession(steps: readonly TrainingStep[]): void {
    const session = createSession();
    commitSteps(session, steps);
    this.session = session;
  }

  public depthOf = (skillId: SkillId): number => this.depths.depth(skillId);

  public nameOf(skillId: SkillId): string {
    return (
      this.provider.nameOf(skillId) ??
      `${getResolverConstants().unknownSkillLabel} (${skillId})`
    );
  }

  private expanderFor(collector: WarningCollector): PrerequisiteExpander {
    const lookup: RequirementLookup = (skillId) =>
      this.requirementsFor(skillId, collector);
    return new PrerequisiteExpander(lookup);
  }

  private requirementsFor(
    skillId: SkillId,
    collector?: WarningCollector
  ): readonly SkillRequirement[] {
    let requirements: readonly SkillRequirement[] | undefined;
    let reason = "unknown to the provider";
    try {
      requirements = this.provider.requirementsOf(skillId);
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
    }
    if (requirements === undefined) {
      collector?.unknownSkill(skillId, reason);
      return [];
    }
    return requirements;
  }
}
