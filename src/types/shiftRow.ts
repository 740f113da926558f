/** One CSV record; every field kept as the string it was exported as. */
export type RawRow = Record<string, string>;

export interface ShiftTable {
  columns: string[];
  rows: RawRow[];
}

/** A row restricted to the fields the API accepts for a shift. */
export type ShiftRecord = Readonly<Record<string, string>>;

export interface ShiftGroup {
  needId: string;
  shifts: ShiftRecord[];
}

/** Request body for one need, e.g. `{ "shifts": [...] }`. */
export type PayloadFragment = Readonly<Record<string, readonly ShiftRecord[]>>;

export interface ShiftPayload {
  // Integer-like need ids would be re-sorted as object keys, so the
  // submission order is kept separately.
  readonly order: readonly string[];
  readonly needs: Readonly<Record<string, PayloadFragment>>;
}
