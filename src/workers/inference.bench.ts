import { bench, describe } from "vitest";
import { buildFamilyGraph, type FamilyGraph } from "../lib/familyGraph";
import { countAssignments, infer } from "../lib/heredityInference";
import type { FamilyRecord } from "../types/familyRecords";

function createPerson(
  name: string,
  trait: boolean | null,
  parents: [string, string] | null = null,
): FamilyRecord {
  return {
    name,
    mother: parents ? parents[0] : null,
    father: parents ? parents[1] : null,
    trait,
  };
}

// Founding couple, then each generation is one child who marries an outsider.
function createLineage(generations: number, observeEvery: number): FamilyGraph {
  const records: FamilyRecord[] = [
    createPerson("g0_mother", true),
    createPerson("g0_father", null),
  ];

  let mother = "g0_mother";
  let father = "g0_father";
  for (let g = 1; g <= generations; g++) {
    const child = `g${g}_child`;
    const spouse = `g${g}_spouse`;
    records.push(createPerson(child, g % observeEvery === 0 ? false : null, [mother, father]));
    records.push(createPerson(spouse, null));
    mother = child;
    father = spouse;
  }

  return buildFamilyGraph(records);
}

const small = createLineage(1, 2);
const medium = createLineage(2, 2);
const mediumObserved = createLineage(2, 1);
const large = createLineage(3, 2);

describe("Family size scaling", () => {
  bench(`4 people (${countAssignments(small)} assignments)`, () => {
    infer(small);
  });

  bench(`6 people (${countAssignments(medium)} assignments)`, () => {
    infer(medium);
  });

  bench(`8 people (${countAssignments(large)} assignments)`, () => {
    infer(large);
  });
});

describe("Evidence density (6 people)", () => {
  bench(`sparse evidence (${countAssignments(medium)} assignments)`, () => {
    infer(medium);
  });

  bench(`every child observed (${countAssignments(mediumObserved)} assignments)`, () => {
    infer(mediumObserved);
  });
});
