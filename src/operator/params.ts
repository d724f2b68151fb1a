import { formatShape, isShapeKnown, shapesEqual, type Shape } from "../core/shape";
import { OperatorParamError, ShapeInferenceError } from "./operator-errors";
import type { OperatorParams } from "./operator-property";

export function checkKnownParams(
  op: string,
  params: OperatorParams,
  allowed: string[],
): void {
  const unknown = Object.keys(params).filter((key) => !allowed.includes(key));
  if (unknown.length > 0) {
    throw new OperatorParamError(
      `${op}: unknown parameter(s) ${unknown.join(", ")}; accepted: ${allowed.join(", ")}`,
    );
  }
}

export function readInt(
  op: string,
  params: OperatorParams,
  key: string,
  options: { min?: number; default?: number } = {},
): number {
  const raw = params[key];
  if (raw === undefined) {
    if (options.default === undefined) {
      throw new OperatorParamError(`${op}: missing required parameter ${key}`);
    }
    return options.default;
  }
  const value = typeof raw === "string" ? Number(raw) : raw;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new OperatorParamError(
      `${op}: parameter ${key} must be an integer, got ${String(raw)}`,
    );
  }
  if (options.min !== undefined && value < options.min) {
    throw new OperatorParamError(
      `${op}: parameter ${key} must be >= ${options.min}, got ${value}`,
    );
  }
  return value;
}

export function readFloat(
  op: string,
  params: OperatorParams,
  key: string,
  fallback: number,
): number {
  const raw = params[key];
  if (raw === undefined) return fallback;
  const value = typeof raw === "string" ? Number(raw) : raw;
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new OperatorParamError(
      `${op}: parameter ${key} must be a number, got ${String(raw)}`,
    );
  }
  return value;
}

export function readBool(
  op: string,
  params: OperatorParams,
  key: string,
  fallback: boolean,
): boolean {
  const raw = params[key];
  if (raw === undefined) return fallback;
  if (typeof raw === "boolean") return raw;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new OperatorParamError(
    `${op}: parameter ${key} must be a boolean, got ${String(raw)}`,
  );
}

export function readEnum<T extends string>(
  op: string,
  params: OperatorParams,
  key: string,
  choices: readonly T[],
): T {
  const raw = params[key];
  const match = choices.find((choice) => choice === raw);
  if (match === undefined) {
    throw new OperatorParamError(
      `${op}: parameter ${key} must be one of ${choices.join(", ")}, got ${String(raw)}`,
    );
  }
  return match;
}

/**
 * Returns `expected`, after checking it against the shape already known for
 * the same argument.
 */
export function assignShape(
  op: string,
  arg: string,
  current: Shape | undefined,
  expected: Shape,
): Shape {
  if (isShapeKnown(current) && !shapesEqual(current, expected)) {
    throw new ShapeInferenceError(
      `${op}: shape inconsistent for ${arg}, provided ${formatShape(current)}, inferred ${formatShape(expected)}`,
    );
  }
  return expected.slice();
}
