import { parseCsvRecords, type CsvRecord } from "./csv";
import type {
  SkillId,
  SkillNameLookup,
  SkillRecord,
  SkillRequirement,
  SkillRequirementProvider,
} from "./types";
import { isTrainableLevel } from "./types";

interface SkillEntry {
  skillId: SkillId;
  name: string;
  requirements: SkillRequirement[];
}

/**
 * Keeps one requirement per prerequisite skill, at the highest level any raw
 * entry asks for. First-seen order is preserved.
 */
export const dedupeRequirements = (
  requirements: readonly SkillRequirement[]
): SkillRequirement[] => {
  const maxLevels = new Map<SkillId, number>();
  for (const requirement of requirements) {
    const current = maxLevels.get(requirement.skillId) ?? 0;
    maxLevels.set(requirement.skillId, Math.max(current, requirement.level));
  }
  return Array.from(maxLevels, ([skillId, level]) => ({ skillId, level }));
};

export class SkillTree implements SkillRequirementProvider, SkillNameLookup {
  private skills: Map<SkillId, SkillEntry>;
  private nameIndex: Map<string, SkillId>;

  private constructor(skills: Map<SkillId, SkillEntry>) {
    this.skills = skills;
    this.nameIndex = new Map();
    skills.forEach((entry) => {
      const key = entry.name.toLowerCase();
      if (!this.nameIndex.has(key)) {
        this.nameIndex.set(key, entry.skillId);
      }
    });
  }

  public static fromRecords(records: readonly SkillRecord[]): SkillTree {
    const skills = new Map<SkillId, SkillEntry>();

    for (const record of records) {
      if (!Number.isInteger(record.skillId)) {
        throw new Error(`Skill id must be an integer, got ${record.skillId}.`);
      }
      if (skills.has(record.skillId)) {
        throw new Error(`Duplicate skill ID detected: ${record.skillId}.`);
      }
      for (const requirement of record.requirements) {
        if (requirement.skillId === record.skillId) {
          throw new Error(`Skill ${record.skillId} lists itself as a prerequisite.`);
        }
        if (!isTrainableLevel(requirement.level)) {
          throw new Error(
            `Skill ${record.skillId} requires skill ${requirement.skillId} at invalid level ${requirement.level}.`
          );
        }
      }
      skills.set(record.skillId, {
        skillId: record.skillId,
        name: record.name,
        requirements: dedupeRequirements(record.requirements),
      });
    }

    return new SkillTree(skills);
  }

  public requirementsOf(skillId: SkillId): readonly SkillRequirement[] | undefined {
    return this.skills.get(skillId)?.requirements;
  }

  public nameOf(skillId: SkillId): string | undefined {
    return this.skills.get(skillId)?.name;
  }

  public has(skillId: SkillId): boolean {
    return this.skills.has(skillId);
  }

  public findByName(name: string): SkillId | undefined {
    return this.nameIndex.get(name.trim().toLowerCase());
  }

  public skillIds(): SkillId[] {
    return Array.from(this.skills.keys()).sort((a, b) => a - b);
  }

  public get size(): number {
    return this.skills.size;
  }
}

const parseIntegerCell = (
  record: CsvRecord,
  column: string,
  rowNumber: number
): number => {
  const raw = record[column] ?? "";
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(
      `Column "${column}" on row ${rowNumber} must be an integer, got "${raw}".`
    );
  }
  return Number.parseInt(raw, 10);
};

/**
 * Builds a skill tree from two CSV documents:
 *   skills:        skillId,name
 *   requirements:  skillId,requiredSkillId,requiredLevel
 *
 * Requirement rows may name a required skill that has no row of its own; the
 * resolver treats such skills as having no prerequisites.
 */
export const loadSkillTreeFromCsv = (
  skillsCsv: string,
  requirementsCsv: string
): SkillTree => {
  const skillRows = parseCsvRecords(skillsCsv);
  if (skillRows.length === 0) {
    throw new Error("Skills CSV is empty or missing data rows.");
  }

  const records = new Map<SkillId, SkillRecord>();
  skillRows.forEach((row, index) => {
    const rowNumber = index + 2;
    const skillId = parseIntegerCell(row, "skillId", rowNumber);
    if (records.has(skillId)) {
      throw new Error(`Duplicate skill ID detected: ${skillId}.`);
    }
    const name = row.name ?? "";
    records.set(skillId, {
      skillId,
      name: name || `Skill ${skillId}`,
      requirements: [],
    });
  });

  parseCsvRecords(requirementsCsv).forEach((row, index) => {
    const rowNumber = index + 2;
    const skillId = parseIntegerCell(row, "skillId", rowNumber);
    const requiredSkillId = parseIntegerCell(row, "requiredSkillId", rowNumber);
    const requiredLevel = parseIntegerCell(row, "requiredLevel", rowNumber);
    const record = records.get(skillId);
    if (!record) {
      throw new Error(
        `Requirement row ${rowNumber} references unknown skill ${skillId}.`
      );
    }
    record.requirements.push({ skillId: requiredSkillId, level: requiredLevel });
  });

  return SkillTree.fromRecords(Array.from(records.values()));
};
