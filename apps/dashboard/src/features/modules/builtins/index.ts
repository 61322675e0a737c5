import { ModuleRegistry } from "../ModuleRegistry";

import { BUILTIN_DISPLAYERS } from "./displayers";
import { BUILTIN_SOURCES } from "./sources";

/** A registry holding every built-in source and displayer, still open for more. */
export function createBuiltinRegistry(): ModuleRegistry {
  const registry = new ModuleRegistry();
  for (const source of BUILTIN_SOURCES) registry.registerSource(source);
  for (const displayer of BUILTIN_DISPLAYERS) registry.registerDisplayer(displayer);
  return registry;
}

export { BUILTIN_DISPLAYERS, SCALAR_SHAPES } from "./displayers";
export { BUILTIN_SOURCES, nodeProbe, type SystemProbe } from "./sources";
