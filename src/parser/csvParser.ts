import { Workbook } from "exceljs";
import fs from "fs-extra";
import {
  SchemaMismatchError,
  SourceReadError,
} from "../errors/pipelineErrors";
import { RawRow, ShiftTable } from "../types/shiftRow";

function cellToString(value: unknown): string {
  return value === null || value === undefined ? "" : String(value);
}

async function readWorksheet(filePath: string) {
  const stats = await fs.stat(filePath).catch((err: Error) => {
    throw new SourceReadError(filePath, err.message);
  });
  if (!stats.isFile()) {
    throw new SourceReadError(filePath, "not a regular file");
  }

  // exceljs never listens for errors on the stream it reads from, so a
  // read failure would otherwise leave its promise pending forever.
  const stream = fs.createReadStream(filePath);
  const streamFailed = new Promise<never>((_, reject) => {
    stream.on("error", (err) => {
      reject(new SourceReadError(filePath, err.message));
    });
  });

  const workbook = new Workbook();
  const parsed = workbook.csv
    .read(stream, { map: (value: unknown) => value })
    .catch((err: Error) => {
      throw new SourceReadError(filePath, err.message);
    });

  return Promise.race([parsed, streamFailed]);
}

/**
 * Reads a comma-separated export into a {@link ShiftTable}.
 *
 * Fields are kept exactly as exported: exceljs would otherwise turn
 * "0042" into 42 and "2024-01-05" into a Date, which the API rejects.
 */
export async function loadShiftTable(
  filePath: string,
  requiredColumns: string[] = []
): Promise<ShiftTable> {
  if (!(await fs.pathExists(filePath))) {
    throw new SourceReadError(filePath, "file does not exist");
  }

  const worksheet = await readWorksheet(filePath);

  const headerRow = worksheet.getRow(1);
  const columns: string[] = Array.isArray(headerRow.values)
    ? Array.from(headerRow.values.slice(1), (v) => cellToString(v).trim())
    : [];
  if (columns.length > 0) {
    columns[0] = columns[0].replace(/^\uFEFF/, "").trim();
  }

  const missing = requiredColumns.filter((c) => !columns.includes(c));
  if (missing.length > 0) {
    throw new SchemaMismatchError(filePath, [...new Set(missing)]);
  }

  const rows: RawRow[] = [];
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    const rowValues = Array.isArray(row.values) ? row.values.slice(1) : [];

    const fields = columns.map((_, idx) => cellToString(rowValues[idx]));
    if (fields.every((val) => val === "")) continue;

    rows.push(Object.fromEntries(columns.map((c, idx) => [c, fields[idx]])));
  }

  console.log(`📄 Loaded ${rows.length} row(s) from ${filePath}`);
  return { columns, rows };
}
