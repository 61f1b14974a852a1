import { z } from "zod";

export const GENE_COUNTS = [2, 1, 0] as const;
export const TRAIT_VALUES = [true, false] as const;

export type GeneCount = (typeof GENE_COUNTS)[number];

export const familyRecordSchema = z.object({
  name: z.string(),
  mother: z.string().nullable(),
  father: z.string().nullable(),
  trait: z.boolean().nullable(),
});

export type FamilyRecord = z.infer<typeof familyRecordSchema>;

export const geneDistributionSchema = z.object({
  0: z.number(),
  1: z.number(),
  2: z.number(),
});

export const traitDistributionSchema = z.object({
  true: z.number(),
  false: z.number(),
});

export type GeneDistribution = z.infer<typeof geneDistributionSchema>;
export type TraitDistribution = z.infer<typeof traitDistributionSchema>;

export const probabilityTablesSchema = z.object({
  gene: geneDistributionSchema,
  trait: z.object({
    0: traitDistributionSchema,
    1: traitDistributionSchema,
    2: traitDistributionSchema,
  }),
  mutation: z.number(),
});

export type ProbabilityTables = z.infer<typeof probabilityTablesSchema>;

export const personTallySchema = z.object({
  gene: geneDistributionSchema,
  trait: traitDistributionSchema,
});

/** Per-person gene and trait totals; normalized once inference finishes. */
export type PersonTally = z.infer<typeof personTallySchema>;

export interface PersonState {
  gene: GeneCount;
  trait: boolean;
}

export type Assignment = ReadonlyMap<string, PersonState>;

export type Accumulator = Map<string, PersonTally>;

export type PersonDistribution = PersonTally;

export function traitKey(trait: boolean): "true" | "false" {
  return trait ? "true" : "false";
}
