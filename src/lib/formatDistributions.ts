import { formatProbability, formatProbabilityAsPercentage } from "./formatProbability";
import {
  GENE_COUNTS,
  TRAIT_VALUES,
  traitKey,
  type PersonDistribution,
} from "../types/familyRecords";

export interface FormatOptions {
  percent?: boolean;
  decimals?: number;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function formatDistributions(
  distributions: ReadonlyMap<string, PersonDistribution>,
  options: FormatOptions = {},
): string {
  const format = (p: number): string =>
    options.percent
      ? formatProbabilityAsPercentage(p, options.decimals)
      : formatProbability(p, options.decimals);

  const lines: string[] = [];
  for (const [name, distribution] of distributions) {
    lines.push(`${name}:`);
    lines.push("  Gene:");
    for (const gene of GENE_COUNTS) {
      lines.push(`    ${gene}: ${format(distribution.gene[gene])}`);
    }
    lines.push("  Trait:");
    for (const trait of TRAIT_VALUES) {
      lines.push(`    ${capitalize(traitKey(trait))}: ${format(distribution.trait[traitKey(trait)])}`);
    }
  }
  return lines.join("\n");
}

/** Plain-object form of the distributions, keyed by person name. */
export function distributionsToJson(
  distributions: ReadonlyMap<string, PersonDistribution>,
): Record<string, PersonDistribution> {
  return Object.fromEntries(distributions);
}
