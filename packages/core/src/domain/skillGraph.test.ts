import { describe, expect, it } from "vitest";
import type { SkillId, SkillRequirement } from "@skillqueue/skill-data";
import {
  ENGINEERING,
  EVASIVE_MANEUVERING,
  LOOP_FIRST,
  LOOP_SECOND,
  NAVIGATION,
  SPACESHIP_COMMAND,
  WARP_DRIVE_OPERATION,
  createSampleTree
} from "../mock/sampleSkills";
import { CyclicDependencyError } from "./errors";
import {
  DepthCalculator,
  PrerequisiteExpander,
  ladder,
  orderSteps,
  type RequirementLookup
} from "./skillGraph";

const tree = createSampleTree();

const countingLookup = () => {
  const calls: SkillId[] = [];
  const lookup: RequirementLookup = (skillId): readonly SkillRequirement[] => {
    calls.push(skillId);
    return tree.requirementsOf(skillId) ?? [];
  };
  return { calls, lookup };
};

const steps = (...pairs: Array<[number, number]>) =>
  pairs.map(([skillId, level]) => ({ skillId, level }));

describe("DepthCalculator", () => {
  it("gives skills without prerequisites depth 0", () => {
    const calculator = new DepthCalculator(countingLookup().lookup);
    expect(calculator.depth(NAVIGATION)).toBe(0);
    expect(calculator.depth(ENGINEERING)).toBe(0);
  });

  it("uses the longest prerequisite chain", () => {
    const calculator = new DepthCalculator(countingLookup().lookup);
    expect(calculator.depth(EVASIVE_MANEUVERING)).toBe(1);
    expect(calculator.depth(SPACESHIP_COMMAND)).toBe(1);
    expect(calculator.depth(WARP_DRIVE_OPERATION)).toBe(2);
  });

  it("memoizes depths across calls", () => {
    const { calls, lookup } = countingLookup();
    const calculator = new DepthCalculator(lookup);

    calculator.depth(WARP_DRIVE_OPERATION);
    expect(calls).toEqual([WARP_DRIVE_OPERATION, SPACESHIP_COMMAND, ENGINEERING]);
    expect(calculator.cachedCount).toBe(3);

    calculator.depth(SPACESHIP_COMMAND);
    calculator.depth(WARP_DRIVE_OPERATION);
    expect(calls).toHaveLength(3);
  });

  it("fails fast on a cycle and caches nothing along it", () => {
    const calculator = new DepthCalculator(countingLookup().lookup);

    let caught: unknown;
    try {
      calculator.depth(LOOP_FIRST);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CyclicDependencyError);
    if (caught instanceof CyclicDependencyError) {
      expect(caught.cycle).toEqual([LOOP_FIRST, LOOP_SECOND, LOOP_FIRST]);
      expect(caught.code).toBe("CYCLIC_DEPENDENCY");
    }
    expect(calculator.cachedCount).toBe(0);
  });
});

describe("ladder", () => {
  it("lists every level in the range", () => {
    expect(ladder(NAVIGATION, 1, 3)).toEqual(steps([10, 1], [10, 2], [10, 3]));
  });

  it("is empty when the range is empty", () => {
    expect(ladder(NAVIGATION, 4, 3)).toEqual([]);
  });

  it("never goes below level 1 or above level 5", () => {
    expect(ladder(NAVIGATION, 0, 7)).toEqual(
      steps([10, 1], [10, 2], [10, 3], [10, 4], [10, 5])
    );
  });
});

describe("PrerequisiteExpander", () => {
  it("keeps the highest level required along any path", () => {
    const expander = new PrerequisiteExpander(countingLookup().lookup);
    const ancestors = expander.collectAncestors(WARP_DRIVE_OPERATION);

    expect(Array.from(ancestors)).toEqual([
      [SPACESHIP_COMMAND, 2],
      [ENGINEERING, 2]
    ]);
  });

  it("returns no ancestors for a root skill", () => {
    const expander = new PrerequisiteExpander(countingLookup().lookup);
    expect(expander.collectAncestors(NAVIGATION).size).toBe(0);
  });

  it("expands every ancestor into its full ladder and appends the target", () => {
    const expander = new PrerequisiteExpander(countingLookup().lookup);

    expect(expander.expand(EVASIVE_MANEUVERING, 2)).toEqual(
      steps([10, 1], [10, 2], [10, 3], [20, 1], [20, 2])
    );
  });

  it("starts the target ladder at the requested level", () => {
    const expander = new PrerequisiteExpander(countingLookup().lookup);

    expect(expander.expand(NAVIGATION, 4, 3)).toEqual(steps([10, 3], [10, 4]));
  });

  it("rejects cyclic prerequisite chains", () => {
    const expander = new PrerequisiteExpander(countingLookup().lookup);

    expect(() => expander.collectAncestors(LOOP_SECOND)).toThrow(
      "Cyclic prerequisite chain: 2 -> 1 -> 2"
    );
  });
});

describe("orderSteps", () => {
  const depths = new Map<number, number>([
    [3, 0],
    [5, 0],
    [9, 1],
    [7, 2]
  ]);
  const depthOf = (skillId: number) => depths.get(skillId) ?? 0;

  it("orders by depth, then skill id, then level", () => {
    const unordered = steps([7, 1], [5, 2], [9, 1], [3, 1], [5, 1], [9, 2]);

    expect(orderSteps(unordered, depthOf)).toEqual(
      steps([3, 1], [5, 1], [5, 2], [9, 1], [9, 2], [7, 1])
    );
  });

  it("does not mutate its input", () => {
    const unordered = steps([9, 1], [3, 1]);
    orderSteps(unordered, depthOf);
    expect(unordered).toEqual(steps([9, 1], [3, 1]));
  });

  it("asks for each skill depth once", () => {
    const asked: number[] = [];
    orderSteps(steps([5, 1], [5, 2], [3, 1], [5, 3]), (skillId) => {
      asked.push(skillId);
      return depthOf(skillId);
    });
    expect(asked.sort((a, b) => a - b)).toEqual([3, 5]);
  });
});
