import {
  EmptyGroupKeyError,
  FieldMissingError,
} from "../errors/pipelineErrors";
import {
  PayloadFragment,
  ShiftGroup,
  ShiftPayload,
  ShiftTable,
} from "../types/shiftRow";

/**
 * Partitions rows by need id. Groups come out in first-seen order and
 * rows keep their table order; the need column itself becomes the
 * group key and never appears in a shift.
 */
export function groupShifts(
  table: ShiftTable,
  groupColumn: string,
  keepColumns: string[]
): ShiftGroup[] {
  const missing = [groupColumn, ...keepColumns].filter(
    (c) => !table.columns.includes(c)
  );
  if (missing.length > 0) {
    throw new FieldMissingError("group shifts", [...new Set(missing)]);
  }

  const fields = keepColumns.filter((c) => c !== groupColumn);
  const groups = new Map<string, ShiftGroup>();

  table.rows.forEach((row, idx) => {
    const needId = row[groupColumn] ?? "";
    if (needId.trim() === "") {
      throw new EmptyGroupKeyError(groupColumn, idx + 1);
    }

    const shift = Object.fromEntries(
      fields.map((field) => [field, row[field] ?? ""])
    );

    const group = groups.get(needId);
    if (group) {
      group.shifts.push(shift);
    } else {
      groups.set(needId, { needId, shifts: [shift] });
    }
  });

  return [...groups.values()];
}

/**
 * Nests each group under `shiftsKey`. Need ids become own properties
 * (so "__proto__" is a key like any other) and the result is frozen:
 * what gets validated is what gets sent.
 */
export function toShiftPayload(
  groups: ShiftGroup[],
  shiftsKey: string
): ShiftPayload {
  const needs = Object.fromEntries(
    groups.map(({ needId, shifts }): [string, PayloadFragment] => [
      needId,
      Object.freeze({
        [shiftsKey]: Object.freeze(shifts.map((s) => Object.freeze({ ...s }))),
      }),
    ])
  );

  return Object.freeze({
    order: Object.freeze(groups.map((g) => g.needId)),
    needs: Object.freeze(needs),
  });
}
