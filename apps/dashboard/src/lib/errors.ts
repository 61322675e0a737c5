/**
 * Error types shared by every dashboard feature.
 *
 * Each error carries a `kind` discriminant so callers can branch without
 * `instanceof` chains. Errors reported inline by the UI (placement,
 * compatibility, config) are thrown to the originating call; fetch errors
 * stay inside the scheduler.
 */

/* --------------------------------------------------------------------------
   Kinds
   -------------------------------------------------------------------------- */

export type DashboardErrorKind =
  | "PlacementConflict"
  | "IncompatibleModule"
  | "UnknownType"
  | "ConfigValidation"
  | "DuplicateType"
  | "RegistrySealed"
  | "SourceFetchError"
  | "CorruptConfig";

export type ModuleKind = "source" | "displayer";

export type FetchErrorSeverity = "transient" | "permanent";

/** A single failing option reported by config validation. */
export interface ConfigIssue {
  key: string;
  message: string;
}

/* --------------------------------------------------------------------------
   Base class
   -------------------------------------------------------------------------- */

export class DashboardError extends Error {
  constructor(
    public readonly kind: DashboardErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "DashboardError";
  }
}

/* --------------------------------------------------------------------------
   Concrete errors
   -------------------------------------------------------------------------- */

export class PlacementConflictError extends DashboardError {
  constructor(
    message: string,
    /** Panels whose cells block the requested rect (empty for out-of-bounds). */
    public readonly conflictingIds: string[] = [],
  ) {
    super("PlacementConflict", message);
    this.name = "PlacementConflictError";
  }
}

export class IncompatibleModuleError extends DashboardError {
  constructor(
    public readonly sourceType: string,
    public readonly displayerType: string,
  ) {
    super(
      "IncompatibleModule",
      `Displayer "${displayerType}" cannot render the output of source "${sourceType}"`,
    );
    this.name = "IncompatibleModuleError";
  }
}

export class UnknownTypeError extends DashboardError {
  constructor(
    public readonly moduleKind: ModuleKind,
    public readonly typeKey: string,
  ) {
    super("UnknownType", `Unknown ${moduleKind} type "${typeKey}"`);
    this.name = "UnknownTypeError";
  }
}

export class ConfigValidationError extends DashboardError {
  constructor(
    public readonly typeKey: string,
    public readonly issues: ConfigIssue[],
  ) {
    super(
      "ConfigValidation",
      `Invalid configuration for "${typeKey}": ${issues
        .map((issue) => `${issue.key}: ${issue.message}`)
        .join("; ")}`,
    );
    this.name = "ConfigValidationError";
  }
}

export class DuplicateTypeError extends DashboardError {
  constructor(
    public readonly moduleKind: ModuleKind,
    public readonly typeKey: string,
  ) {
    super("DuplicateType", `A ${moduleKind} named "${typeKey}" is already registered`);
    this.name = "DuplicateTypeError";
  }
}

export class RegistrySealedError extends DashboardError {
  constructor(typeKey: string) {
    super(
      "RegistrySealed",
      `Cannot register "${typeKey}": modules must be registered before any panel is created`,
    );
    this.name = "RegistrySealedError";
  }
}

export class SourceFetchError extends DashboardError {
  constructor(
    message: string,
    public readonly severity: FetchErrorSeverity = "transient",
  ) {
    super("SourceFetchError", message);
    this.name = "SourceFetchError";
  }
}

export class CorruptConfigError extends DashboardError {
  constructor(
    public readonly location: string,
    reason: string,
  ) {
    super("CorruptConfig", `Layout at ${location} could not be parsed: ${reason}`);
    this.name = "CorruptConfigError";
  }
}

/* --------------------------------------------------------------------------
   Helpers
   -------------------------------------------------------------------------- */

/** Narrow an unknown value to a dashboard error, optionally of one kind. */
export function isDashboardError(value: unknown, kind?: DashboardErrorKind): value is DashboardError {
  if (!(value instanceof DashboardError)) return false;
  return kind === undefined || value.kind === kind;
}

/** Convert anything thrown by a source into a `SourceFetchError`. */
export function toSourceFetchError(error: unknown): SourceFetchError {
  if (error instanceof SourceFetchError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new SourceFetchError(message, "transient");
}

/** Human-readable message for any thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
