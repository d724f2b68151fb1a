export type SymbolErrorKind =
  | "ArityMismatch"
  | "TupleArgument"
  | "AmbiguousName"
  | "UnknownKeyword"
  | "NonScalarReceiver";

export abstract class SymbolError extends Error {
  abstract readonly kind: SymbolErrorKind;
}

export class ArityMismatchError extends SymbolError {
  name = "ArityMismatchError";
  readonly kind = "ArityMismatch";

  constructor(
    readonly required: number,
    readonly provided: number,
  ) {
    super(
      `Incorrect number of arguments, requires ${required}, provided ${provided}`,
    );
  }
}

export class TupleArgumentError extends SymbolError {
  name = "TupleArgumentError";
  readonly kind = "TupleArgument";

  /** Position of a positional argument, or the keyword of a keyword argument. */
  constructor(readonly argument: number | string) {
    super(
      typeof argument === "number"
        ? `Argument ${argument} is a tuple, scalar is required`
        : `Keyword argument ${argument} is a tuple, scalar is required`,
    );
  }
}

export class AmbiguousNameError extends SymbolError {
  name = "AmbiguousNameError";
  readonly kind = "AmbiguousName";

  constructor(readonly duplicates: Record<string, number>) {
    const lines = Object.entries(duplicates).map(
      ([argName, count]) =>
        `Argument name "${argName}" occurs in ${count} places in the symbol`,
    );
    super(
      `${lines.join("\n")}\nKeyword argument call is not supported because of this duplication`,
    );
  }
}

export class UnknownKeywordError extends SymbolError {
  name = "UnknownKeywordError";
  readonly kind = "UnknownKeyword";

  constructor(
    readonly source: string,
    readonly unmatched: string[],
    readonly candidates: string[],
  ) {
    const listed = unmatched.map((key) => `"${key}"`).join(", ");
    const candidateLines = candidates
      .map((candidate, i) => `\t[${i}]${candidate}`)
      .join("\n");
    super(
      `${source}: keyword argument name ${listed} not found.\nCandidate arguments:\n${candidateLines}`,
    );
  }
}

export class NonScalarReceiverError extends SymbolError {
  name = "NonScalarReceiverError";
  readonly kind = "NonScalarReceiver";

  constructor(readonly reason: "tuple" | "variable") {
    super(
      reason === "tuple"
        ? "Only composition of value function is supported currently"
        : "Variable cannot be composed",
    );
  }
}

/**
 * Builds the aggregate diagnostic for keyword arguments that did not match:
 * every user key absent from the candidates, reported together.
 */
export function keywordMismatch(
  source: string,
  userKeys: string[],
  candidates: string[],
): UnknownKeywordError {
  const known = new Set(candidates);
  const unmatched = userKeys.filter((key) => !known.has(key));
  return new UnknownKeywordError(source, unmatched, candidates);
}
