/**
 * Rigger Kernel — Error Types
 *
 * Every failure the kernel raises on its own account is one of these classes.
 * Transport failures coming out of a TargetNode are never wrapped: they reach
 * the caller of the primitive unchanged.
 *
 * Validation mismatches are not errors. A `validate` action answers with a
 * boolean so a dry run can report drift without aborting.
 */

/**
 * A package definition or file specification is malformed.
 *
 * Raised at definition time (while a packages module registers its
 * definitions), before anything is executed on a node.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A trigger reference could not be resolved to an action.
 *
 * `reference` holds the string exactly as it was passed to `trigger`.
 */
export class MissingActionError extends Error {
  constructor(readonly reference: string) {
    super(`Action '${reference}' could not be found.`);
    this.name = 'MissingActionError';
  }
}

/**
 * The package runner was asked for a package the index does not hold, either
 * directly or through a dependency / dependent edge.
 */
export class UnknownPackageError extends Error {
  constructor(
    readonly packageName: string,
    readonly requiredBy?: string,
  ) {
    super(
      requiredBy === undefined
        ? `Package '${packageName}' is not registered.`
        : `Package '${packageName}' (required by '${requiredBy}') is not registered.`,
    );
    this.name = 'UnknownPackageError';
  }
}

/**
 * An action body read a configuration field that is not set.
 *
 * Only the router's final fallback throws this; every other config accessor
 * answers `undefined` for an absent key.
 */
export class ConfigLookupError extends Error {
  constructor(readonly field: string) {
    super(`Configuration field '${field}' is not set.`);
    this.name = 'ConfigLookupError';
  }
}
