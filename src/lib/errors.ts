export type HeredityErrorCode =
  | "MALFORMED_RECORD"
  | "CYCLIC_ANCESTRY"
  | "IMPOSSIBLE_EVIDENCE"
  | "INVALID_TABLES";

export class HeredityError extends Error {
  readonly code: HeredityErrorCode;

  constructor(code: HeredityErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MalformedRecordError extends HeredityError {
  constructor(message: string) {
    super("MALFORMED_RECORD", message);
  }
}

export class CyclicAncestryError extends HeredityError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("CYCLIC_ANCESTRY", `Cyclic ancestry: ${cycle.join(" -> ")}`);
    this.cycle = cycle;
  }
}

/**
 * Raised when a person's accumulated gene or trait mass is zero, i.e. no
 * assignment consistent with the evidence has positive probability.
 */
export class ImpossibleEvidenceError extends HeredityError {
  readonly person: string;

  constructor(person: string, field: "gene" | "trait") {
    super(
      "IMPOSSIBLE_EVIDENCE",
      `Evidence is impossible under the model: ${field} distribution for ${person} has no probability mass`,
    );
    this.person = person;
  }
}

export class InvalidProbabilityTablesError extends HeredityError {
  constructor(message: string) {
    super("INVALID_TABLES", message);
  }
}
