export type ErrorKind =
  | "ParseError"
  | "UnknownFunction"
  | "InvalidArgument"
  | "InvalidDefinition"
  | "InvalidCondition"
  | "InvalidMatch"
  | "MatchNotFound"
  | "NotIterable"
  | "NegativeNumber"
  | "InvalidList"
  | "OutOfBounds"
  | "MaxDepthReached"
  | "MissingSeed"
  | "InvalidRoot"
  | "MalformedBlock";

export class ScriptError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
  ) {
    super(message);
    this.name = kind;
  }
}

export function isScriptError(e: unknown, kind?: ErrorKind): e is ScriptError {
  return e instanceof ScriptError && (kind === undefined || e.kind === kind);
}

// ============================================================================
// Standard errors
// ============================================================================

export const parseError = (line: number, column: number) =>
  new ScriptError("ParseError", `Could not parse file. (line ${line}, column ${column})`);

export const unknownFunction = (name: string) =>
  new ScriptError("UnknownFunction", `Unknown function \`${name}\`.`);

export const invalidArgument = (name: string) =>
  new ScriptError("InvalidArgument", `Invalid argument passed to \`${name}\` function.`);

export const invalidArgumentCount = (name: string) =>
  new ScriptError("InvalidArgument", `Invalid number of arguments to \`${name}\` function.`);

export const incorrectArgumentCount = (name: string) =>
  new ScriptError("InvalidArgument", `Incorrect number of arguments passed to \`${name}\` function.`);

export const invalidDefinition = (message: string) => new ScriptError("InvalidDefinition", message);

export const invalidCondition = () =>
  new ScriptError("InvalidCondition", "If condition must reduce to a boolean.");

export const invalidMatch = () =>
  new ScriptError("InvalidMatch", "Incorrect type comparison in match statement.");

export const matchNotFound = () =>
  new ScriptError("MatchNotFound", "Not all possibilities covered in match statement.");

export const notIterable = () => new ScriptError("NotIterable", "Value is not iterable.");

export const negativeNumber = () =>
  new ScriptError("NegativeNumber", "Cannot iterate over negative number.");

export const invalidList = () => new ScriptError("InvalidList", "Type mismatch in list.");

export const outOfBounds = () => new ScriptError("OutOfBounds", "Index out of bounds.");

export const maxDepthReached = (depth: number) =>
  new ScriptError("MaxDepthReached", `Maximum recursion depth of ${depth} reached.`);

export const missingSeed = () => new ScriptError("MissingSeed", "Seed required for rng.");

export const invalidRoot = () =>
  new ScriptError("InvalidRoot", "The `root` function must return a shape.");

export const malformedBlock = (detail: string) =>
  new ScriptError("MalformedBlock", `Malformed block: ${detail}`);
