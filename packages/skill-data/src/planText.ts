import type { SkillNameLookup, SkillPlanParseResult, SkillRequest } from "./types";

const PLAN_LINE = /^(.+?)\s+([1-5])$/;

/**
 * Parses a pasted plan, one "<skill name> <level>" entry per line, e.g.
 * "Navigation 3". Entries keep their input order; lines that do not match go
 * to `parseErrors` and names the lookup cannot resolve go to `notFoundSkills`.
 */
export const parseSkillPlanText = (
  text: string,
  lookup: SkillNameLookup
): SkillPlanParseResult => {
  const requests: SkillRequest[] = [];
  const parseErrors: string[] = [];
  const notFoundSkills: string[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const match = PLAN_LINE.exec(line);
    if (!match) {
      parseErrors.push(line);
      continue;
    }

    const name = match[1].trim();
    const level = Number.parseInt(match[2], 10);
    const skillId = lookup.findByName(name);
    if (skillId === undefined) {
      notFoundSkills.push(name);
      continue;
    }
    requests.push({ skillId, level });
  }

  return { requests, parseErrors, notFoundSkills };
};
