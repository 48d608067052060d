import { describe, expect, it } from "vitest";
import { act, renderHook } from "@testing-library/react";
import { silentLogger } from "../logger";
import {
  EVASIVE_MANEUVERING,
  NAVIGATION,
  createSampleTree
} from "../mock/sampleSkills";
import { useTrainingPlan } from "./useTrainingPlan";

const tree = createSampleTree();

const renderPlan = () =>
  renderHook(() => useTrainingPlan({ tree, logger: silentLogger }));

const levelsOf = (steps: { skillId: number; level: number }[]) =>
  steps.map(step => [step.skillId, step.level]);

describe("useTrainingPlan", () => {
  it("accumulates only new steps across requests", () => {
    const { result } = renderPlan();

    let added: { skillId: number; level: number }[] = [];
    act(() => {
      added = result.current.addSkill(EVASIVE_MANEUVERING, 2);
    });

    expect(levelsOf(added)).toEqual([
      [NAVIGATION, 1],
      [NAVIGATION, 2],
      [NAVIGATION, 3],
      [EVASIVE_MANEUVERING, 1],
      [EVASIVE_MANEUVERING, 2]
    ]);
    expect(result.current.steps[0]).toEqual({
      skillId: NAVIGATION,
      skillName: "Navigation",
      level: 1
    });

    act(() => {
      added = result.current.addSkill(EVASIVE_MANEUVERING, 2);
    });

    expect(added).toEqual([]);
    expect(result.current.steps).toHaveLength(5);
  });

  it("exposes invalid requests as an error", () => {
    const { result } = renderPlan();

    act(() => {
      result.current.addSkill(EVASIVE_MANEUVERING, 7);
    });

    expect(result.current.error?.message).toBe(
      "Invalid level 7 for skill 20: expected an integer from 1 to 5"
    );
    expect(result.current.steps).toEqual([]);
  });

  it("continues from an imported queue", () => {
    const { result } = renderPlan();

    act(() => {
      result.current.importQueue([
        { skillId: NAVIGATION, level: 1 },
        { skillId: EVASIVE_MANEUVERING, level: 1 }
      ]);
    });

    expect(levelsOf(result.current.steps)).toEqual([
      [NAVIGATION, 1],
      [NAVIGATION, 2],
      [NAVIGATION, 3],
      [EVASIVE_MANEUVERING, 1]
    ]);

    act(() => {
      result.current.addSkill(EVASIVE_MANEUVERING, 2);
    });

    expect(levelsOf(result.current.steps)).toEqual([
      [NAVIGATION, 1],
      [NAVIGATION, 2],
      [NAVIGATION, 3],
      [EVASIVE_MANEUVERING, 1],
      [EVASIVE_MANEUVERING, 2]
    ]);
  });

  it("clears the plan on reset", () => {
    const { result } = renderPlan();

    act(() => {
      result.current.addSkill(NAVIGATION, 1);
    });
    act(() => {
      result.current.reset();
    });

    expect(result.current.steps).toEqual([]);

    let added: { skillId: number; level: number }[] = [];
    act(() => {
      added = result.current.addSkill(NAVIGATION, 1);
    });
    expect(levelsOf(added)).toEqual([[NAVIGATION, 1]]);
  });
});
