export * from "./types";
export { SkillTree, dedupeRequirements, loadSkillTreeFromCsv } from "./skillTree";
export { parseTrainedLevelsCsv } from "./trainedLevels";
export { parseSkillPlanText } from "./planText";
export { parseCsv, parseCsvRecords, trimEmptyRows } from "./csv";
export type { CsvRecord, CsvRow } from "./csv";
