/**
 * @rigger/kernel
 *
 * Rigger execution kernel — execution context, capability router, trigger
 * resolution, mock context, file action generator, package registry and
 * runner, and the adapter interfaces they drive.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for content hashing (pure computation, not I/O).
 *
 * Concrete node, host, template and log sink implementations live in
 * @rigger/runtime-host.
 */

// Errors
export {
  ConfigLookupError,
  ConfigurationError,
  MissingActionError,
  UnknownPackageError,
} from './errors.js';

// Configuration
export type { ConfigInput, ConfigObject, ConfigScalar, ConfigValue } from './config/config.js';
export { Config } from './config/config.js';

// Types
export type { FileStat, NodeHelper, RunOptions, TargetNode } from './types/node.js';
export type { ActionBody, LifecycleAction, Package, PackageIndex } from './types/package.js';
export { LIFECYCLE_ACTIONS } from './types/package.js';

// Adapter interfaces
export type { CommandResult, LocalHost, TemplateEngine } from './adapters/index.js';

// Logging
export type { LogSink } from './logging/log-sink.js';

// Execution
export type { ExecutionContextInit } from './context/execution-context.js';
export { ExecutionContext } from './context/execution-context.js';
export { MockExecutionContext } from './context/mock-context.js';
export type { ActionScope, OperationName, ScopedBody } from './context/router.js';
export { CapabilityRouter, OPERATIONS, isOperationName } from './context/router.js';
export type { ActionReference } from './context/reference.js';
export {
  REFERENCE_SEPARATOR,
  formatActionReference,
  parseActionReference,
} from './context/reference.js';
export { describeEffect, formatMode, ownerSpec } from './context/effects.js';
export { shellQuote } from './context/shell.js';

// Files
export type { FileHandle } from './files/file-handle.js';
export { BaseFile, LocalFile, RemoteFile } from './files/file-handle.js';
export type { TemplateOptions } from './files/template.js';
export { TEMPLATE_TEMPFILE_PREFIX, Template } from './files/template.js';
export type { Deferrable, Deferred, FileSpec, SpecValue } from './files/file-action.js';
export {
  CONTENT_UNIT,
  FileActionGenerator,
  PERMISSIONS_UNIT,
  REMOTE_TEMP_PREFIX,
  fileUnitName,
  specValue,
} from './files/file-action.js';

// Registry
export { PackageDefinition, PackageRegistry } from './registry/package-registry.js';
export type { GenerateUnit } from './registry/package-builder.js';
export { PackageBuilder } from './registry/package-builder.js';

// Runner
export type { RunReport, RunStep, StepOutcome } from './runner/runner.js';
export { PackageRunner } from './runner/runner.js';
