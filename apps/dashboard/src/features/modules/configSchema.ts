/**
 * Config schema validation for source and displayer options.
 *
 * A `ConfigSchema` is turned into a zod object at validation time. String
 * encodings of numbers and booleans are coerced, unknown keys pass through
 * untouched and missing keys take the option default.
 */

import { z } from "zod";

import { ConfigValidationError, type ConfigIssue } from "@/lib/errors";

import type { ConfigOption, ConfigPrimitive, ConfigSchema, ModuleConfig } from "./types";

/* --------------------------------------------------------------------------
   Common source options
   -------------------------------------------------------------------------- */

export const UPDATE_SECTION_TITLE = "Data Source & Update";
export const ALARM_SECTION_TITLE = "Alarm";

export const DEFAULT_UPDATE_INTERVAL_SECONDS = 2.0;
export const DEFAULT_ALARM_HIGH_VALUE = 80;
export const DEFAULT_ALARM_COLOR = "#ff0000";

const UPDATE_OPTIONS: ConfigOption[] = [
  {
    key: "updateIntervalSeconds",
    type: "number",
    label: "Update Interval (s)",
    default: DEFAULT_UPDATE_INTERVAL_SECONDS,
    min: 0.1,
    max: 60,
    step: 0.1,
  },
];

const ALARM_OPTIONS: ConfigOption[] = [
  { key: "alarmEnabled", type: "bool", label: "Enable Alarm", default: false },
  {
    key: "alarmHighValue",
    type: "number",
    label: "Alarm High Value",
    default: DEFAULT_ALARM_HIGH_VALUE,
    min: -10000,
    max: 100000,
  },
  { key: "alarmColor", type: "color", label: "Alarm Color", default: DEFAULT_ALARM_COLOR },
];

/**
 * Append the update and alarm sections to a source schema, skipping any
 * option key the schema already declares.
 */
export function withCommonSourceSections(schema: ConfigSchema): ConfigSchema {
  const declared = new Set(flattenSchema(schema).map((option) => option.key));
  const extra: ConfigSchema = [
    { title: UPDATE_SECTION_TITLE, options: UPDATE_OPTIONS.filter((o) => !declared.has(o.key)) },
    { title: ALARM_SECTION_TITLE, options: ALARM_OPTIONS.filter((o) => !declared.has(o.key)) },
  ];
  return [...schema, ...extra.filter((section) => section.options.length > 0)];
}

/* --------------------------------------------------------------------------
   Schema helpers
   -------------------------------------------------------------------------- */

export function flattenSchema(schema: ConfigSchema): ConfigOption[] {
  return schema.flatMap((section) => section.options);
}

/** Every option default, keyed by option key. */
export function defaultConfig(schema: ConfigSchema): ModuleConfig {
  const config: ModuleConfig = {};
  for (const option of flattenSchema(schema)) {
    if (option.default !== undefined) config[option.key] = option.default;
  }
  return config;
}

const COLOR_PATTERN = /^#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

function coerceNumber(value: unknown): unknown {
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? value : parsed;
  }
  return value;
}

function coerceBoolean(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const lowered = value.trim().toLowerCase();
  if (lowered === "true" || lowered === "1") return true;
  if (lowered === "false" || lowered === "0") return false;
  return value;
}

type OptionSchema = z.ZodType<ConfigPrimitive, z.ZodTypeDef, unknown>;

function baseSchemaFor(option: ConfigOption): OptionSchema {
  switch (option.type) {
    case "bool":
      return z.preprocess(coerceBoolean, z.boolean());
    case "number": {
      let schema = z.number().finite();
      if (option.min !== undefined) schema = schema.min(option.min);
      if (option.max !== undefined) schema = schema.max(option.max);
      return z.preprocess(coerceNumber, schema);
    }
    case "color":
      return z.string().regex(COLOR_PATTERN, "Expected a #rrggbb or #rrggbbaa colour");
    case "dropdown": {
      const allowed = Object.values(option.choices ?? {});
      return z.string().refine((value) => allowed.includes(value), {
        message: `Expected one of ${allowed.join(", ")}`,
      });
    }
    case "string":
    case "font":
    case "file":
      return z.string();
  }
}

function optionSchema(option: ConfigOption): OptionSchema {
  const base = baseSchemaFor(option);
  const { validate } = option;
  if (!validate) return base;
  return base.superRefine((value, ctx) => {
    const message = validate(value);
    if (message) ctx.addIssue({ code: z.ZodIssueCode.custom, message });
  });
}

/** Build the zod object validating a whole config against `schema`. */
export function buildConfigValidator(schema: ConfigSchema) {
  const shape: Record<string, z.ZodOptional<OptionSchema>> = {};
  for (const option of flattenSchema(schema)) {
    shape[option.key] = optionSchema(option).optional();
  }
  return z.object(shape).passthrough();
}

/* --------------------------------------------------------------------------
   Resolution
   -------------------------------------------------------------------------- */

/**
 * Validate `input` against `schema` and fill in defaults.
 *
 * Throws `ConfigValidationError` listing every failing key.
 */
export function resolveConfig(typeKey: string, schema: ConfigSchema, input: ModuleConfig): ModuleConfig {
  const result = buildConfigValidator(schema).safeParse(input);
  if (!result.success) {
    const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
      key: issue.path.length > 0 ? String(issue.path[0]) : "(root)",
      message: issue.message,
    }));
    throw new ConfigValidationError(typeKey, issues);
  }

  const resolved: ModuleConfig = { ...result.data };
  for (const option of flattenSchema(schema)) {
    if (resolved[option.key] === undefined) {
      if (option.default !== undefined) resolved[option.key] = option.default;
      else delete resolved[option.key];
    }
  }
  return resolved;
}

/* --------------------------------------------------------------------------
   Typed readers
   -------------------------------------------------------------------------- */

export function numberOption(config: ModuleConfig, key: string, fallback: number): number {
  const value = config[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function stringOption(config: ModuleConfig, key: string, fallback: string): string {
  const value = config[key];
  return typeof value === "string" ? value : fallback;
}

export function boolOption(config: ModuleConfig, key: string, fallback: boolean): boolean {
  const value = config[key];
  return typeof value === "boolean" ? value : fallback;
}
