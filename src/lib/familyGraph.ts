import { CyclicAncestryError, MalformedRecordError } from "./errors";
import type { FamilyRecord } from "../types/familyRecords";

export interface Person {
  readonly name: string;
  readonly mother: string | null;
  readonly father: string | null;
  readonly trait: boolean | null;
}

export interface FamilyGraph {
  readonly people: ReadonlyMap<string, Person>;
}

export function hasParents(person: Person): boolean {
  return person.mother !== null && person.father !== null;
}

function checkRecord(record: FamilyRecord, known: Set<string>): void {
  if (record.name.trim() === "") {
    throw new MalformedRecordError("Person name cannot be empty");
  }
  if (known.has(record.name)) {
    throw new MalformedRecordError(`Duplicate person: ${record.name}`);
  }
  if ((record.mother === null) !== (record.father === null)) {
    throw new MalformedRecordError(
      `${record.name} must have both parents recorded or neither`,
    );
  }
}

// Depth-first walk over parent links; a grey node seen again closes a cycle.
function findCycle(people: ReadonlyMap<string, Person>): string[] | null {
  const state = new Map<string, "visiting" | "done">();
  const path: string[] = [];

  const visit = (name: string): string[] | null => {
    const current = state.get(name);
    if (current === "done") return null;
    if (current === "visiting") {
      return [...path.slice(path.indexOf(name)), name];
    }

    state.set(name, "visiting");
    path.push(name);

    const person = people.get(name);
    if (person && hasParents(person)) {
      for (const parent of [person.mother, person.father]) {
        if (parent === null) continue;
        const cycle = visit(parent);
        if (cycle) return cycle;
      }
    }

    path.pop();
    state.set(name, "done");
    return null;
  };

  for (const name of people.keys()) {
    const cycle = visit(name);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Builds an immutable family graph from parsed evidence records.
 *
 * Parent names are resolved against the whole record set, so a child may
 * appear before its parents. Throws `MalformedRecordError` for dangling or
 * half-specified parentage and `CyclicAncestryError` when someone is their
 * own ancestor.
 */
export function buildFamilyGraph(records: readonly FamilyRecord[]): FamilyGraph {
  const people = new Map<string, Person>();
  const known = new Set<string>();

  for (const record of records) {
    checkRecord(record, known);
    known.add(record.name);
  }

  for (const record of records) {
    for (const parent of [record.mother, record.father]) {
      if (parent !== null && !known.has(parent)) {
        throw new MalformedRecordError(
          `${record.name} references unknown parent ${parent}`,
        );
      }
    }
    people.set(
      record.name,
      Object.freeze({
        name: record.name,
        mother: record.mother,
        father: record.father,
        trait: record.trait,
      }),
    );
  }

  const cycle = findCycle(people);
  if (cycle) {
    throw new CyclicAncestryError(cycle);
  }

  return Object.freeze({ people });
}

export function familyRecords(graph: FamilyGraph): FamilyRecord[] {
  return Array.from(graph.people.values(), (person) => ({
    name: person.name,
    mother: person.mother,
    father: person.father,
    trait: person.trait,
  }));
}
