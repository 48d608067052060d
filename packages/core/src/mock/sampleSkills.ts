import { SkillTree, type SkillRecord } from "@skillqueue/skill-data";

export const NAVIGATION = 10;
export const EVASIVE_MANEUVERING = 20;
export const WARP_DRIVE_OPERATION = 30;
export const SPACESHIP_COMMAND = 40;
export const ENGINEERING = 50;
export const SALVAGING = 60;
export const MISSING_SKILL = 999;
export const LOOP_FIRST = 1;
export const LOOP_SECOND = 2;

/**
 * Small skill graph for tests:
 *   Evasive Maneuvering -> Navigation III
 *   Warp Drive Operation -> Spaceship Command II, Engineering I
 *   Spaceship Command -> Engineering II
 *   Salvaging -> skill 999 II (absent from the tree)
 *   Loop Alpha <-> Loop Beta
 */
export const sampleSkillRecords: SkillRecord[] = [
  { skillId: NAVIGATION, name: "Navigation", requirements: [] },
  {
    skillId: EVASIVE_MANEUVERING,
    name: "Evasive Maneuvering",
    requirements: [{ skillId: NAVIGATION, level: 3 }]
  },
  {
    skillId: WARP_DRIVE_OPERATION,
    name: "Warp Drive Operation",
    requirements: [
      { skillId: SPACESHIP_COMMAND, level: 2 },
      { skillId: ENGINEERING, level: 1 }
    ]
  },
  {
    skillId: SPACESHIP_COMMAND,
    name: "Spaceship Command",
    requirements: [{ skillId: ENGINEERING, level: 2 }]
  },
  { skillId: ENGINEERING, name: "Engineering", requirements: [] },
  {
    skillId: SALVAGING,
    name: "Salvaging",
    requirements: [{ skillId: MISSING_SKILL, level: 2 }]
  },
  {
    skillId: LOOP_FIRST,
    name: "Loop Alpha",
    requirements: [{ skillId: LOOP_SECOND, level: 1 }]
  },
  {
    skillId: LOOP_SECOND,
    name: "Loop Beta",
    requirements: [{ skillId: LOOP_FIRST, level: 1 }]
  }
];

export const createSampleTree = (): SkillTree =>
  SkillTree.fromRecords(sampleSkillRecords);
