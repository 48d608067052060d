import { describe, expect, it } from "vitest";
import { parseSkillPlanText } from "./planText";
import { SkillTree } from "./skillTree";

const tree = SkillTree.fromRecords([
  { skillId: 10, name: "Navigation", requirements: [] },
  { skillId: 40, name: "Spaceship Command", requirements: [] }
]);

describe("parseSkillPlanText", () => {
  it("turns each line into a request in input order", () => {
    const result = parseSkillPlanText("Spaceship Command 2\r\n  navigation 4  \n", tree);

    expect(result).toEqual({
      requests: [
        { skillId: 40, level: 2 },
        { skillId: 10, level: 4 }
      ],
      parseErrors: [],
      notFoundSkills: []
    });
  });

  it("collects lines that do not end in a level from 1 to 5", () => {
    const result = parseSkillPlanText("Navigation 6\nNavigation\n\nNavigation 1", tree);

    expect(result.parseErrors).toEqual(["Navigation 6", "Navigation"]);
    expect(result.requests).toEqual([{ skillId: 10, level: 1 }]);
  });

  it("collects names the tree does not know", () => {
    const result = parseSkillPlanText("Cloaking 3\nNavigation 2", tree);

    expect(result.notFoundSkills).toEqual(["Cloaking"]);
    expect(result.requests).toEqual([{ skillId: 10, level: 2 }]);
  });
});
