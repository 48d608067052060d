import Papa, { type ParseError } from "papaparse";

export type CsvRow = string[];
export type CsvRecord = Record<string, string | undefined>;

const cleanLineBreaks = (text: string): string => text.replace(/\r\n/g, "\n");

const describeErrors = (errors: ParseError[]): string =>
  errors
    .map((error) =>
      error.row === undefined
        ? error.message
        : `row ${error.row + 1}: ${error.message}`
    )
    .join("; ");

export const parseCsv = (text: string): CsvRow[] => {
  const result = Papa.parse<CsvRow>(cleanLineBreaks(text).trim(), {
    delimiter: ",",
    skipEmptyLines: true,
  });
  if (result.errors.length > 0) {
    throw new Error(`Malformed CSV: ${describeErrors(result.errors)}`);
  }
  return result.data.map((row) => row.map((cell) => cell.trim()));
};

/** Header-mode parse; cells are trimmed, and columns a row lacks come back undefined. */
export const parseCsvRecords = (text: string): CsvRecord[] => {
  const result = Papa.parse<CsvRecord>(cleanLineBreaks(text).trim(), {
    header: true,
    delimiter: ",",
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim(),
    transform: (value) => value.trim(),
  });
  if (result.errors.length > 0) {
    throw new Error(`Malformed CSV: ${describeErrors(result.errors)}`);
  }
  return result.data;
};

export const trimEmptyRows = (rows: CsvRow[]): CsvRow[] =>
  rows.filter((row) => row.some((cell) => cell.trim().length > 0));
