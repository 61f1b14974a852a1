import {
  GENE_COUNTS,
  type FamilyRecord,
  type ProbabilityTables,
} from "../types/familyRecords";

/**
 * Stable key for a family plus its tables. Record order does not matter;
 * any change to parentage, evidence or a table entry changes the key.
 */
export function computeProbabilisticFingerprint(
  records: readonly FamilyRecord[],
  tables: ProbabilityTables,
): string {
  // JSON keeps names apart even when they contain separators
  const people = JSON.stringify(
    records
      .slice()
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map((record) => [record.name, record.mother, record.father, record.trait]),
  );

  const genes = GENE_COUNTS.map((gene) => `${gene}=${tables.gene[gene]}`).join(",");
  const traits = GENE_COUNTS.map(
    (gene) => `${gene}=${tables.trait[gene].true}/${tables.trait[gene].false}`,
  ).join(",");

  return `${people}#${genes}#${traits}#m=${tables.mutation}`;
}
