import { FieldMissingError } from "../errors/pipelineErrors";
import { RawRow, ShiftTable } from "../types/shiftRow";

export interface StartColumns {
  dateColumn: string;
  timeColumn: string;
  startColumn: string;
}

export interface NormalizeOptions extends StartColumns {
  dropColumns: string[];
}

function requireColumns(
  table: ShiftTable,
  columns: string[],
  stage: string
) {
  const missing = columns.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new FieldMissingError(stage, missing);
  }
}

/** Drops rows identical to an earlier row on every column; first one wins. */
export function deduplicateRows(table: ShiftTable): ShiftTable {
  const seen = new Set<string>();
  const rows = table.rows.filter((row) => {
    const key = JSON.stringify(table.columns.map((c) => row[c] ?? ""));
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  return { columns: [...table.columns], rows };
}

/** Joins date and time into `startColumn`, e.g. "2024-01-05 09:00". */
export function mergeStartColumn(
  table: ShiftTable,
  { dateColumn, timeColumn, startColumn }: StartColumns
): ShiftTable {
  requireColumns(table, [dateColumn, timeColumn], "merge start");

  const rows = table.rows.map(
    (row): RawRow => ({
      ...row,
      [startColumn]: `${row[dateColumn]} ${row[timeColumn]}`,
    })
  );
  const columns = table.columns.includes(startColumn)
    ? [...table.columns]
    : [...table.columns, startColumn];

  return { columns, rows };
}

/**
 * Drops informational columns the API does not accept. Every listed
 * column must be present, so dropping the same list twice fails.
 */
export function dropColumns(table: ShiftTable, columns: string[]): ShiftTable {
  requireColumns(table, columns, "drop columns");

  const dropped = new Set(columns);
  const rows = table.rows.map(
    (row): RawRow =>
      Object.fromEntries(
        Object.entries(row).filter(([key]) => !dropped.has(key))
      )
  );

  return { columns: table.columns.filter((c) => !dropped.has(c)), rows };
}

export function normalizeShiftTable(
  table: ShiftTable,
  options: NormalizeOptions
): ShiftTable {
  const unique = deduplicateRows(table);
  if (unique.rows.length < table.rows.length) {
    console.log(
      `⏭️ Skipped ${table.rows.length - unique.rows.length} duplicate row(s)`
    );
  }
  const merged = mergeStartColumn(unique, options);
  return dropColumns(merged, options.dropColumns);
}
