import { ImpossibleEvidenceError } from "./errors";
import type { FamilyGraph, Person } from "./familyGraph";
import { DEFAULT_PROBABILITY_TABLES } from "./probabilityTables";
import {
  traitKey,
  type Accumulator,
  type Assignment,
  type GeneCount,
  type PersonDistribution,
  type PersonState,
  type PersonTally,
  type ProbabilityTables,
} from "../types/familyRecords";

export interface Partition {
  index: number;
  count: number;
}

export interface EnumerationOptions {
  partition?: Partition;
}

// Digit value doubles as the gene count
const ENUMERATED_GENES: readonly GeneCount[] = [0, 1, 2];

const LARGE_ENUMERATION = 50_000_000;

function checkPartition(partition: Partition): void {
  if (!Number.isInteger(partition.count) || partition.count < 1) {
    throw new Error(`Partition count must be a positive integer, got ${partition.count}`);
  }
  if (
    !Number.isInteger(partition.index) ||
    partition.index < 0 ||
    partition.index >= partition.count
  ) {
    throw new Error(
      `Partition index must be in [0, ${partition.count}), got ${partition.index}`,
    );
  }
}

export function countAssignments(graph: FamilyGraph): number {
  let total = 1;
  for (const person of graph.people.values()) {
    total *= person.trait === null ? 6 : 3;
  }
  return total;
}

/**
 * Lazily yields every gene/trait assignment consistent with the observed
 * traits, as an odometer over people in graph order. Each person contributes
 * a base-3 gene digit; people with unknown trait add a base-2 trait digit.
 *
 * With a partition, only the assignments whose ordinal is congruent to
 * `partition.index` modulo `partition.count` are yielded.
 */
export function* enumerateAssignments(
  graph: FamilyGraph,
  options: EnumerationOptions = {},
): Generator<Assignment, void, undefined> {
  const partition = options.partition ?? { index: 0, count: 1 };
  checkPartition(partition);

  const people: Person[] = Array.from(graph.people.values());
  const geneDigits = people.map(() => 0);
  const traitDigits = people.map(() => 0);
  const freeTraits = people.map((person) => person.trait === null);

  let ordinal = 0;
  for (;;) {
    if (ordinal % partition.count === partition.index) {
      const assignment = new Map<string, PersonState>();
      people.forEach((person, i) => {
        assignment.set(person.name, {
          gene: ENUMERATED_GENES[geneDigits[i]],
          trait: person.trait ?? traitDigits[i] === 1,
        });
      });
      yield assignment;
    }
    ordinal++;

    // Advance the odometer; a carry out of the last person ends the sequence.
    let i = 0;
    for (; i < people.length; i++) {
      if (geneDigits[i] < 2) {
        geneDigits[i]++;
        break;
      }
      geneDigits[i] = 0;
      if (freeTraits[i]) {
        if (traitDigits[i] === 0) {
          traitDigits[i] = 1;
          break;
        }
        traitDigits[i] = 0;
      }
    }
    if (i === people.length) return;
  }
}

/** Probability that a parent with `gene` copies passes a copy to a child. */
export function transmissionProbability(
  gene: GeneCount,
  tables: ProbabilityTables,
): number {
  switch (gene) {
    case 2:
      return 1 - tables.mutation;
    case 1:
      return 0.5;
    case 0:
      return tables.mutation;
  }
}

export function inheritedGeneProbability(
  child: GeneCount,
  motherGene: GeneCount,
  fatherGene: GeneCount,
  tables: ProbabilityTables,
): number {
  const fromMother = transmissionProbability(motherGene, tables);
  const fromFather = transmissionProbability(fatherGene, tables);

  switch (child) {
    case 2:
      return fromMother * fromFather;
    case 1:
      return fromMother * (1 - fromFather) + (1 - fromMother) * fromFather;
    case 0:
      return (1 - fromMother) * (1 - fromFather);
  }
}

function stateOf(assignment: Assignment, name: string): PersonState {
  const state = assignment.get(name);
  if (!state) {
    throw new Error(`Assignment has no state for ${name}`);
  }
  return state;
}

/**
 * Probability of one complete assignment: the product over people of
 * P(gene | parents' genes) and P(trait | gene).
 */
export function jointProbability(
  graph: FamilyGraph,
  tables: ProbabilityTables,
  assignment: Assignment,
): number {
  let joint = 1;

  for (const person of graph.people.values()) {
    const { gene, trait } = stateOf(assignment, person.name);

    let geneProbability: number;
    if (person.mother !== null && person.father !== null) {
      geneProbability = inheritedGeneProbability(
        gene,
        stateOf(assignment, person.mother).gene,
        stateOf(assignment, person.father).gene,
        tables,
      );
    } else {
      geneProbability = tables.gene[gene];
    }

    joint *= geneProbability * tables.trait[gene][traitKey(trait)];
  }

  return joint;
}

function emptyTally(): PersonTally {
  return {
    gene: { 0: 0, 1: 0, 2: 0 },
    trait: { true: 0, false: 0 },
  };
}

export function createAccumulator(graph: FamilyGraph): Accumulator {
  const accumulator: Accumulator = new Map();
  for (const name of graph.people.keys()) {
    accumulator.set(name, emptyTally());
  }
  return accumulator;
}

/** Adds `p` to every person's gene and trait bucket named by the assignment. */
export function updateAccumulator(
  accumulator: Accumulator,
  assignment: Assignment,
  p: number,
): void {
  for (const [name, tally] of accumulator) {
    const { gene, trait } = stateOf(assignment, name);
    tally.gene[gene] += p;
    tally.trait[traitKey(trait)] += p;
  }
}

export function mergeAccumulators(target: Accumulator, source: Accumulator): Accumulator {
  for (const [name, partial] of source) {
    const tally = target.get(name);
    if (!tally) {
      target.set(name, {
        gene: { ...partial.gene },
        trait: { ...partial.trait },
      });
      continue;
    }
    tally.gene[0] += partial.gene[0];
    tally.gene[1] += partial.gene[1];
    tally.gene[2] += partial.gene[2];
    tally.trait.true += partial.trait.true;
    tally.trait.false += partial.trait.false;
  }
  return target;
}

function hasMass(sum: number): boolean {
  return Number.isFinite(sum) && sum > 0;
}

export function normalizeTally(name: string, tally: PersonTally): PersonDistribution {
  const geneSum = tally.gene[0] + tally.gene[1] + tally.gene[2];
  if (!hasMass(geneSum)) {
    throw new ImpossibleEvidenceError(name, "gene");
  }

  const traitSum = tally.trait.true + tally.trait.false;
  if (!hasMass(traitSum)) {
    throw new ImpossibleEvidenceError(name, "trait");
  }

  return {
    gene: {
      0: tally.gene[0] / geneSum,
      1: tally.gene[1] / geneSum,
      2: tally.gene[2] / geneSum,
    },
    trait: {
      true: tally.trait.true / traitSum,
      false: tally.trait.false / traitSum,
    },
  };
}

export function normalizeAccumulator(
  accumulator: Accumulator,
): Map<string, PersonDistribution> {
  const distributions = new Map<string, PersonDistribution>();
  for (const [name, tally] of accumulator) {
    distributions.set(name, normalizeTally(name, tally));
  }
  return distributions;
}

/** Unnormalized totals over one partition of the enumeration. */
export function accumulatePartition(
  graph: FamilyGraph,
  tables: ProbabilityTables,
  partition?: Partition,
): Accumulator {
  const accumulator = createAccumulator(graph);
  for (const assignment of enumerateAssignments(graph, { partition })) {
    updateAccumulator(accumulator, assignment, jointProbability(graph, tables, assignment));
  }
  return accumulator;
}

export function infer(
  graph: FamilyGraph,
  tables: ProbabilityTables = DEFAULT_PROBABILITY_TABLES,
): Map<string, PersonDistribution> {
  const total = countAssignments(graph);
  if (total > LARGE_ENUMERATION) {
    console.warn(
      `Enumerating ${total} assignments for ${graph.people.size} people; this may take a long time.`,
    );
  }
  return normalizeAccumulator(accumulatePartition(graph, tables));
}
