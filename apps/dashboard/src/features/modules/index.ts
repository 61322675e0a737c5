/**
 * Modules feature barrel export.
 */

export { ModuleRegistry } from "./ModuleRegistry";
export { createBuiltinRegistry, BUILTIN_DISPLAYERS, BUILTIN_SOURCES, SCALAR_SHAPES } from "./builtins";
export {
  ALARM_SECTION_TITLE,
  DEFAULT_ALARM_HIGH_VALUE,
  DEFAULT_UPDATE_INTERVAL_SECONDS,
  UPDATE_SECTION_TITLE,
  defaultConfig,
  flattenSchema,
  resolveConfig,
  withCommonSourceSections,
} from "./configSchema";
export { collection, formatReading, numericReading, scalar } from "./values";

export type {
  CollectionValue,
  ConfigOption,
  ConfigSchema,
  ConfigSection,
  DataValue,
  Displayer,
  DisplayerDescriptor,
  ModuleConfig,
  NamedScalar,
  RenderSurface,
  ScalarValue,
  ShapeTag,
  Source,
  SourceDescriptor,
} from "./types";
export { SHAPE_TAGS } from "./types";
