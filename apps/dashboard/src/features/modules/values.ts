/**
 * Helpers for building and reading `DataValue`s.
 */

import type { CollectionValue, DataValue, NamedScalar, ScalarValue, ShapeTag } from "./types";

export function scalar(shape: ShapeTag, value: number, unit: string, label?: string): ScalarValue {
  return label === undefined ? { kind: "scalar", shape, value, unit } : { kind: "scalar", shape, value, unit, label };
}

export function collection(shape: ShapeTag, items: NamedScalar[]): CollectionValue {
  return { kind: "collection", shape, items };
}

/**
 * Single number representing a value: the scalar itself, or the largest
 * item of a collection. `undefined` for an empty collection.
 */
export function numericReading(value: DataValue): number | undefined {
  if (value.kind === "scalar") return value.value;
  if (value.items.length === 0) return undefined;
  return Math.max(...value.items.map((item) => item.value));
}

/** Fixed-point number with an optional unit, e.g. `42.5 %`. */
export function formatReading(value: number, unit: string, decimals: number, showUnit: boolean): string {
  const text = value.toFixed(Math.max(0, Math.min(6, Math.round(decimals))));
  return showUnit && unit ? `${text} ${unit}` : text;
}
