import type { NamedTrainingStep, ResolutionWarning } from "../domain/models";

export interface TrainingStepListProps {
  steps: NamedTrainingStep[];
  warnings?: ResolutionWarning[];
  emptyMessage?: string;
}

const ROMAN_LEVELS = ["0", "I", "II", "III", "IV", "V"];

export const formatLevel = (level: number): string =>
  ROMAN_LEVELS[level] ?? String(level);

export const TrainingStepList = ({
  steps,
  warnings = [],
  emptyMessage = "No training steps planned yet."
}: TrainingStepListProps) => {
  if (steps.length === 0 && warnings.length === 0) {
    return <p style={{ color: "#6F7D8C" }}>{emptyMessage}</p>;
  }

  return (
    <div>
      {warnings.length > 0 ? (
        <ul aria-label="Plan warnings" style={{ margin: "0 0 0.5rem 0", color: "#F7B733" }}>
          {warnings.map(warning => (
            <li key={`${warning.kind}-${warning.skillId}`}>{warning.message}</li>
          ))}
        </ul>
      ) : null}
      <ol aria-label="Training steps" style={{ margin: 0, paddingLeft: "1.5rem" }}>
        {steps.map(step => (
          <li
            key={`${step.skillId}_${step.level}`}
            style={{ fontVariantNumeric: "tabular-nums", padding: "0.25rem 0" }}
          >
            {step.skillName} {formatLevel(step.level)}
          </li>
        ))}
      </ol>
    </div>
  );
};
