import { readFileSync } from "node:fs";
import { InvalidProbabilityTablesError } from "./errors";
import {
  GENE_COUNTS,
  probabilityTablesSchema,
  type GeneDistribution,
  type ProbabilityTables,
} from "../types/familyRecords";

const SUM_TOLERANCE = 1e-9;

function freezeTables(tables: ProbabilityTables): Readonly<ProbabilityTables> {
  Object.freeze(tables.gene);
  for (const gene of GENE_COUNTS) {
    Object.freeze(tables.trait[gene]);
  }
  Object.freeze(tables.trait);
  return Object.freeze(tables);
}

export const DEFAULT_PROBABILITY_TABLES: Readonly<ProbabilityTables> = freezeTables({
  // Unconditional probability of carrying 0, 1 or 2 copies
  gene: { 2: 0.01, 1: 0.03, 0: 0.96 },
  trait: {
    2: { true: 0.65, false: 0.35 },
    1: { true: 0.56, false: 0.44 },
    0: { true: 0.01, false: 0.99 },
  },
  // Chance that a transmitted copy flips on the way to the child
  mutation: 0.01,
});

function isProbability(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

function geneSum(dist: GeneDistribution): number {
  return dist[0] + dist[1] + dist[2];
}

export function validateProbabilityTables(
  tables: ProbabilityTables,
): { valid: true } | { valid: false; error: string } {
  for (const gene of GENE_COUNTS) {
    if (!isProbability(tables.gene[gene])) {
      return {
        valid: false,
        error: `Invalid gene prior for ${gene} copies: ${tables.gene[gene]}. Must be between 0 and 1.`,
      };
    }
  }

  if (Math.abs(geneSum(tables.gene) - 1) > SUM_TOLERANCE) {
    return {
      valid: false,
      error: `Gene prior must sum to 1, but sums to ${geneSum(tables.gene)}`,
    };
  }

  for (const gene of GENE_COUNTS) {
    const row = tables.trait[gene];
    if (!isProbability(row.true) || !isProbability(row.false)) {
      return {
        valid: false,
        error: `Invalid trait probability for ${gene} copies. Must be between 0 and 1.`,
      };
    }
    if (Math.abs(row.true + row.false - 1) > SUM_TOLERANCE) {
      return {
        valid: false,
        error: `Trait row for ${gene} copies must sum to 1, but sums to ${row.true + row.false}`,
      };
    }
  }

  if (!isProbability(tables.mutation)) {
    return {
      valid: false,
      error: `Invalid mutation rate: ${tables.mutation}. Must be between 0 and 1.`,
    };
  }

  return { valid: true };
}

export function parseProbabilityTables(raw: unknown): Readonly<ProbabilityTables> {
  const parsed = probabilityTablesSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    throw new InvalidProbabilityTablesError(
      `Malformed probability tables${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown error"}`,
    );
  }

  const result = validateProbabilityTables(parsed.data);
  if (!result.valid) {
    throw new InvalidProbabilityTablesError(result.error);
  }

  return freezeTables(parsed.data);
}

export function loadProbabilityTables(filePath: string): Readonly<ProbabilityTables> {
  const text = readFileSync(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidProbabilityTablesError(
      `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseProbabilityTables(raw);
}
