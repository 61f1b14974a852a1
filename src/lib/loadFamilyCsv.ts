import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { z } from "zod";
import { MalformedRecordError } from "./errors";
import { familyRecordSchema, type FamilyRecord } from "../types/familyRecords";

const COLUMNS = ["name", "mother", "father", "trait"] as const;

type Column = (typeof COLUMNS)[number];

function parseTrait(raw: string, line: number): boolean | null {
  switch (raw) {
    case "1":
      return true;
    case "0":
      return false;
    case "":
      return null;
    default:
      throw new MalformedRecordError(
        `Line ${line}: trait must be 1, 0 or blank, got "${raw}"`,
      );
  }
}

/**
 * Splits one CSV line. Cells may be quoted, with `""` for a literal quote, so
 * names can hold commas. A quoted cell cannot span lines.
 */
function splitCsvLine(raw: string, line: number): string[] {
  const cells: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < raw.length; i++) {
    const char = raw[i];
    if (quoted) {
      if (char !== '"') {
        current += char;
      } else if (raw[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      cells.push(current);
      current = "";
    } else {
      current += char;
    }
  }

  if (quoted) {
    throw new MalformedRecordError(`Line ${line}: unterminated quoted cell`);
  }
  cells.push(current);
  return cells;
}

/**
 * Parses `name,mother,father,trait` rows. Columns may appear in any order;
 * blank parent cells mean the parent is not recorded.
 */
export function parseFamilyCsv(text: string): FamilyRecord[] {
  const lines = text.split(/\r?\n/);
  const header = splitCsvLine(lines[0] ?? "", 1).map((cell) => cell.trim());

  const index = new Map<Column, number>();
  for (const column of COLUMNS) {
    const position = header.indexOf(column);
    if (position === -1) {
      throw new MalformedRecordError(`Missing "${column}" column in header`);
    }
    index.set(column, position);
  }

  const cell = (cells: string[], column: Column): string =>
    (cells[index.get(column) ?? -1] ?? "").trim();

  const records: FamilyRecord[] = [];
  lines.slice(1).forEach((raw, i) => {
    const line = i + 2;
    if (raw.trim() === "") return;

    const cells = splitCsvLine(raw, line);
    if (cells.length !== header.length) {
      throw new MalformedRecordError(
        `Line ${line}: expected ${header.length} cells, found ${cells.length}`,
      );
    }

    records.push({
      name: cell(cells, "name"),
      mother: cell(cells, "mother") || null,
      father: cell(cells, "father") || null,
      trait: parseTrait(cell(cells, "trait"), line),
    });
  });

  return records;
}

export function parseFamilyJson(raw: unknown): FamilyRecord[] {
  const parsed = z.array(familyRecordSchema).safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedRecordError(
      `Invalid family record at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown error"}`,
    );
  }
  return parsed.data;
}

export function loadFamilyCsv(filePath: string): FamilyRecord[] {
  return parseFamilyCsv(readFileSync(filePath, "utf8"));
}

/** Loads evidence from a `.json` record array or, otherwise, a CSV file. */
export function loadFamilyRecords(filePath: string): FamilyRecord[] {
  if (extname(filePath).toLowerCase() !== ".json") {
    return loadFamilyCsv(filePath);
  }

  const text = readFileSync(filePath, "utf8");
  try {
    return parseFamilyJson(JSON.parse(text));
  } catch (error) {
    if (error instanceof MalformedRecordError) throw error;
    throw new MalformedRecordError(
      `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}
