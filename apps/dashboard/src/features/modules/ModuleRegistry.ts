/**
 * Catalog of source and displayer types.
 *
 * Modules register themselves once at startup; panels reference them by
 * type key. The registry seals on the first instance creation, after which
 * the catalog is read-only.
 */

import {
  DuplicateTypeError,
  IncompatibleModuleError,
  RegistrySealedError,
  UnknownTypeError,
  type ModuleKind,
} from "@/lib/errors";
import { createLogger } from "@/lib/logger";

import { resolveConfig, withCommonSourceSections } from "./configSchema";
import type { Displayer, DisplayerDescriptor, ModuleConfig, Source, SourceDescriptor } from "./types";

const log = createLogger("modules");

function byLabel<T extends { label: string; typeKey: string }>(a: T, b: T): number {
  return a.label.localeCompare(b.label) || a.typeKey.localeCompare(b.typeKey);
}

export class ModuleRegistry {
  private sources = new Map<string, SourceDescriptor>();
  private displayers = new Map<string, DisplayerDescriptor>();
  private sealed = false;

  /* -- Registration ------------------------------------------------------- */

  /** Register a source type. Its schema gains the common update and alarm sections. */
  registerSource(descriptor: SourceDescriptor): void {
    this.assertWritable(descriptor.typeKey);
    if (this.sources.has(descriptor.typeKey)) {
      throw new DuplicateTypeError("source", descriptor.typeKey);
    }
    this.sources.set(descriptor.typeKey, {
      ...descriptor,
      configSchema: withCommonSourceSections(descriptor.configSchema),
    });
    log.debug(`Registered source "${descriptor.typeKey}" (${descriptor.shapeTag})`);
  }

  registerDisplayer(descriptor: DisplayerDescriptor): void {
    this.assertWritable(descriptor.typeKey);
    if (this.displayers.has(descriptor.typeKey)) {
      throw new DuplicateTypeError("displayer", descriptor.typeKey);
    }
    this.displayers.set(descriptor.typeKey, descriptor);
    log.debug(`Registered displayer "${descriptor.typeKey}" (${descriptor.accepts.join(", ")})`);
  }

  /** Freeze the catalog. Called implicitly by the first `create*`. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /* -- Lookup ------------------------------------------------------------- */

  getSource(typeKey: string): SourceDescriptor | undefined {
    return this.sources.get(typeKey);
  }

  getDisplayer(typeKey: string): DisplayerDescriptor | undefined {
    return this.displayers.get(typeKey);
  }

  requireSource(typeKey: string): SourceDescriptor {
    const descriptor = this.sources.get(typeKey);
    if (!descriptor) throw new UnknownTypeError("source", typeKey);
    return descriptor;
  }

  requireDisplayer(typeKey: string): DisplayerDescriptor {
    const descriptor = this.displayers.get(typeKey);
    if (!descriptor) throw new UnknownTypeError("displayer", typeKey);
    return descriptor;
  }

  listSources(): SourceDescriptor[] {
    return Array.from(this.sources.values()).sort(byLabel);
  }

  listDisplayers(): DisplayerDescriptor[] {
    return Array.from(this.displayers.values()).sort(byLabel);
  }

  /* -- Compatibility ------------------------------------------------------ */

  /** Displayers whose accepted shapes include the source's shape tag. */
  compatibleDisplayers(sourceTypeKey: string): DisplayerDescriptor[] {
    const { shapeTag } = this.requireSource(sourceTypeKey);
    return this.listDisplayers().filter((d) => d.accepts.includes(shapeTag));
  }

  compatibleSources(displayerTypeKey: string): SourceDescriptor[] {
    const { accepts } = this.requireDisplayer(displayerTypeKey);
    return this.listSources().filter((s) => accepts.includes(s.shapeTag));
  }

  isCompatible(sourceTypeKey: string, displayerTypeKey: string): boolean {
    const source = this.requireSource(sourceTypeKey);
    return this.requireDisplayer(displayerTypeKey).accepts.includes(source.shapeTag);
  }

  assertCompatible(sourceTypeKey: string, displayerTypeKey: string): void {
    if (!this.isCompatible(sourceTypeKey, displayerTypeKey)) {
      throw new IncompatibleModuleError(sourceTypeKey, displayerTypeKey);
    }
  }

  /* -- Instantiation ------------------------------------------------------ */

  /** Validate a config without instantiating anything. */
  resolveConfig(kind: ModuleKind, typeKey: string, config: ModuleConfig): ModuleConfig {
    const descriptor = kind === "source" ? this.requireSource(typeKey) : this.requireDisplayer(typeKey);
    return resolveConfig(typeKey, descriptor.configSchema, config);
  }

  createSource(typeKey: string, config: ModuleConfig): Source {
    const descriptor = this.requireSource(typeKey);
    const resolved = resolveConfig(typeKey, descriptor.configSchema, config);
    this.sealed = true;
    return descriptor.create(resolved);
  }

  createDisplayer(typeKey: string, config: ModuleConfig): Displayer {
    const descriptor = this.requireDisplayer(typeKey);
    const resolved = resolveConfig(typeKey, descriptor.configSchema, config);
    this.sealed = true;
    return descriptor.create(resolved);
  }

  /* -- Internals ---------------------------------------------------------- */

  private assertWritable(typeKey: string): void {
    if (this.sealed) throw new RegistrySealedError(typeKey);
  }
}
