/**
 * Canonical pure shape utility functions.
 *
 * No imports; usable from every layer.
 * An empty shape means "not known yet".
 */

export type Shape = number[];

export function sizeOf(shape: Shape): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function isShapeKnown(shape: Shape | undefined): shape is Shape {
  return shape !== undefined && shape.length > 0;
}

export function shapesEqual(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function formatShape(shape: Shape): string {
  return `(${shape.join(",")})`;
}
