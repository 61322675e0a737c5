/**
 * Contracts for pluggable data sources and displayers.
 *
 * Sources produce tagged `DataValue`s; displayers declare which shape tags
 * they can render. Descriptors pair a type key with its config schema and a
 * factory, and are registered once at startup.
 */

import type { PanelStyle } from "@/features/panels/types";

/* --------------------------------------------------------------------------
   Shape tags
   -------------------------------------------------------------------------- */

export const SHAPE_TAGS = [
  "scalar-percentage",
  "scalar-temperature",
  "scalar-frequency",
  "scalar-bytes",
  "scalar-generic",
  "named-series",
  "time-series",
  "composite",
  "timestamp",
] as const;

/** Structural form of a source's output. */
export type ShapeTag = (typeof SHAPE_TAGS)[number];

/* --------------------------------------------------------------------------
   Data values
   -------------------------------------------------------------------------- */

export interface ScalarValue {
  kind: "scalar";
  shape: ShapeTag;
  value: number;
  unit: string;
  /** Optional context such as a mount point or core name. */
  label?: string;
}

export interface NamedScalar {
  name: string;
  value: number;
  unit: string;
}

export interface CollectionValue {
  kind: "collection";
  shape: ShapeTag;
  items: NamedScalar[];
}

export type DataValue = ScalarValue | CollectionValue;

/* --------------------------------------------------------------------------
   Config schema
   -------------------------------------------------------------------------- */

export type ConfigOptionType = "string" | "bool" | "number" | "color" | "font" | "dropdown" | "file";

export type ConfigPrimitive = string | number | boolean;

/** Resolved configuration: every schema key present, unknown keys kept. */
export type ModuleConfig = Record<string, unknown>;

export interface ConfigOption {
  key: string;
  type: ConfigOptionType;
  label: string;
  default?: ConfigPrimitive;
  /** Numeric bounds (`number` options). */
  min?: number;
  max?: number;
  step?: number;
  /** Allowed values (`dropdown` options), display label → value. */
  choices?: Record<string, string>;
  tooltip?: string;
  /** Extra check; return a message to reject the value. */
  validate?: (value: ConfigPrimitive) => string | undefined;
}

export interface ConfigSection {
  title: string;
  options: ConfigOption[];
}

export type ConfigSchema = ConfigSection[];

/* --------------------------------------------------------------------------
   Instances
   -------------------------------------------------------------------------- */

export interface Source {
  /** Fetch the current reading. Rejects with `SourceFetchError` on failure. */
  fetch(signal: AbortSignal): Promise<DataValue>;
  describeSchema(): ConfigSchema;
  close?(): void;
}

export interface Point {
  x: number;
  y: number;
}

export interface TextOptions {
  x: number;
  y: number;
  font?: string;
  color?: string;
  align?: "left" | "center" | "right";
}

/** Drawing primitives supplied by the UI to a displayer. */
export interface RenderSurface {
  readonly width: number;
  readonly height: number;
  clear(color: string): void;
  fillRect(x: number, y: number, width: number, height: number, color: string): void;
  drawText(text: string, options: TextOptions): void;
  /** Angles in radians, clockwise from 3 o'clock. */
  strokeArc(cx: number, cy: number, radius: number, start: number, end: number, color: string, lineWidth: number): void;
  strokePolyline(points: Point[], color: string, lineWidth: number): void;
}

export interface Displayer {
  accepts(shape: ShapeTag): boolean;
  /** Receive a fresh value ahead of the next render. */
  update?(value: DataValue): void;
  render(surface: RenderSurface, value: DataValue | undefined, style: PanelStyle): void;
  describeSchema(): ConfigSchema;
  reset?(): void;
  close?(): void;
}

/* --------------------------------------------------------------------------
   Descriptors
   -------------------------------------------------------------------------- */

export interface SourceDescriptor {
  typeKey: string;
  label: string;
  shapeTag: ShapeTag;
  configSchema: ConfigSchema;
  /** Size in cells used when a panel is added without a rect. */
  defaultSize?: { width: number; height: number };
  create(config: ModuleConfig): Source;
}

export interface DisplayerDescriptor {
  typeKey: string;
  label: string;
  /** Compatibility rule: shape tags this displayer renders. */
  accepts: readonly ShapeTag[];
  configSchema: ConfigSchema;
  create(config: ModuleConfig): Displayer;
}
