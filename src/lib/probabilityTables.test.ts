import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { InvalidProbabilityTablesError } from "./errors";
import {
  DEFAULT_PROBABILITY_TABLES,
  loadProbabilityTables,
  parseProbabilityTables,
  validateProbabilityTables,
} from "./probabilityTables";

const EXAMPLE_TABLES = fileURLToPath(new URL("../../data/tables.example.json", import.meta.url));

function tablesJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    gene: { 2: 0.01, 1: 0.03, 0: 0.96 },
    trait: {
      2: { true: 0.65, false: 0.35 },
      1: { true: 0.56, false: 0.44 },
      0: { true: 0.01, false: 0.99 },
    },
    mutation: 0.01,
    ...overrides,
  };
}

describe("validateProbabilityTables", () => {
  it("accepts the default tables", () => {
    expect(validateProbabilityTables(DEFAULT_PROBABILITY_TABLES)).toEqual({ valid: true });
  });

  it("rejects a prior that does not sum to one", () => {
    const result = validateProbabilityTables({
      ...DEFAULT_PROBABILITY_TABLES,
      gene: { 0: 0.5, 1: 0.25, 2: 0.5 },
    });

    expect(result).toEqual({ valid: false, error: "Gene prior must sum to 1, but sums to 1.25" });
  });

  it("rejects an out-of-range trait probability", () => {
    const result = validateProbabilityTables({
      ...DEFAULT_PROBABILITY_TABLES,
      trait: {
        ...DEFAULT_PROBABILITY_TABLES.trait,
        1: { true: 1.5, false: -0.5 },
      },
    });

    expect(result).toEqual({
      valid: false,
      error: "Invalid trait probability for 1 copies. Must be between 0 and 1.",
    });
  });

  it("rejects a trait row that does not sum to one", () => {
    const result = validateProbabilityTables({
      ...DEFAULT_PROBABILITY_TABLES,
      trait: {
        ...DEFAULT_PROBABILITY_TABLES.trait,
        2: { true: 0.5, false: 0.25 },
      },
    });

    expect(result).toEqual({
      valid: false,
      error: "Trait row for 2 copies must sum to 1, but sums to 0.75",
    });
  });

  it("rejects a negative mutation rate", () => {
    const result = validateProbabilityTables({ ...DEFAULT_PROBABILITY_TABLES, mutation: -0.1 });

    expect(result).toEqual({
      valid: false,
      error: "Invalid mutation rate: -0.1. Must be between 0 and 1.",
    });
  });
});

describe("parseProbabilityTables", () => {
  it("parses JSON-shaped tables with string keys", () => {
    const tables = parseProbabilityTables(JSON.parse(JSON.stringify(tablesJson({ mutation: 0.02 }))));

    expect(tables.mutation).toBe(0.02);
    expect(tables.gene[1]).toBe(0.03);
    expect(tables.trait[2].true).toBe(0.65);
    expect(Object.isFrozen(tables.trait[2])).toBe(true);
  });

  it("reports the path of a missing field", () => {
    const { mutation: _mutation, ...withoutMutation } = tablesJson();

    expect(() => parseProbabilityTables(withoutMutation)).toThrow(/at mutation/);
    expect(() => parseProbabilityTables(withoutMutation)).toThrow(InvalidProbabilityTablesError);
  });

  it("rejects tables that parse but do not validate", () => {
    expect(() => parseProbabilityTables(tablesJson({ mutation: 2 }))).toThrow(
      "Invalid mutation rate: 2. Must be between 0 and 1.",
    );
  });
});

describe("loadProbabilityTables", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "heredity-tables-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads the example tables file", () => {
    expect(loadProbabilityTables(EXAMPLE_TABLES)).toEqual(DEFAULT_PROBABILITY_TABLES);
  });

  it("rejects a file that is not JSON", () => {
    const file = join(dir, "broken.json");
    writeFileSync(file, "{ gene: ");

    expect(() => loadProbabilityTables(file)).toThrow(InvalidProbabilityTablesError);
  });
});
