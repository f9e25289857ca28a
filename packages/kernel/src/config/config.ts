/**
 * Rigger Kernel — Configuration Tree
 *
 * A Config is a hierarchical mapping from string keys to scalars
 * (string, number, boolean) or nested Config sections.
 *
 * Accessors never throw on a missing key: they answer `undefined`. The only
 * place an absent field becomes an error is the capability router's final
 * fallback (see ConfigLookupError).
 *
 * Merge rule (fill-missing-only):
 *   mergeMissing(source) copies every key of `source` that the destination
 *   does not hold. When both sides hold a section under the same key, the
 *   sections are merged recursively under the same rule. A key already
 *   present in the destination is never overwritten. Consequently the merge
 *   is idempotent: merging the same defaults twice equals merging once.
 *
 * Along a trigger chain this yields the precedence
 *   caller-level explicit values > context config > package defaults.
 */

import { ConfigurationError } from '../errors.js';

// ---------------------------------------------------------------------------
// Value types
// ---------------------------------------------------------------------------

export type ConfigScalar = string | number | boolean;

/** A value held by a Config: a scalar or a nested section. */
export type ConfigValue = ConfigScalar | Config;

/**
 * Plain-object form accepted by Config.from(). Keys mapped to `undefined`
 * are skipped, which lets callers spread optional values.
 */
export interface ConfigInput {
  readonly [key: string]: ConfigScalar | ConfigInput | undefined;
}

/** Plain-object form produced by Config.toJSON(). */
export interface ConfigObject {
  [key: string]: ConfigScalar | ConfigObject;
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export class Config {
  private readonly entries: Map<string, ConfigValue> = new Map();

  /** Build a Config from a trusted, typed plain object. */
  static from(input: ConfigInput = {}): Config {
    const config = new Config();
    for (const [key, value] of Object.entries(input)) {
      if (value !== undefined) {
        config.set(key, value);
      }
    }
    return config;
  }

  /**
   * Build a Config from untrusted input (parsed JSON, CLI files).
   *
   * @throws {ConfigurationError} naming the dotted path of the first value
   *   that is neither a scalar nor a plain object
   */
  static parse(raw: unknown, path = ''): Config {
    if (!isPlainObject(raw)) {
      throw new ConfigurationError(
        path === ''
          ? 'Configuration must be an object.'
          : `Configuration section '${path}' must be an object.`,
      );
    }
    const config = new Config();
    for (const [key, value] of Object.entries(raw)) {
      const at = path === '' ? key : `${path}.${key}`;
      if (isScalar(value)) {
        config.entries.set(key, value);
      } else if (isPlainObject(value)) {
        config.entries.set(key, Config.parse(value, at));
      } else {
        throw new ConfigurationError(
          `Configuration value at '${at}' must be a string, number, boolean or object.`,
        );
      }
    }
    return config;
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): ReadonlyArray<string> {
    return Array.from(this.entries.keys());
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): ConfigValue | undefined {
    return this.entries.get(key);
  }

  /**
   * Resolve a dotted path (`nginx.port`) through nested sections.
   * Answers `undefined` as soon as a segment is missing or is not a section.
   */
  lookup(path: string): ConfigValue | undefined {
    let current: ConfigValue | undefined = this;
    for (const segment of path.split('.')) {
      if (!(current instanceof Config)) return undefined;
      current = current.get(segment);
    }
    return current;
  }

  getString(key: string): string | undefined {
    const value = this.entries.get(key);
    return typeof value === 'string' ? value : undefined;
  }

  getNumber(key: string): number | undefined {
    const value = this.entries.get(key);
    return typeof value === 'number' ? value : undefined;
  }

  getBoolean(key: string): boolean | undefined {
    const value = this.entries.get(key);
    return typeof value === 'boolean' ? value : undefined;
  }

  section(key: string): Config | undefined {
    const value = this.entries.get(key);
    return value instanceof Config ? value : undefined;
  }

  /** Set (or replace) a key. Plain objects become nested sections. */
  set(key: string, value: ConfigScalar | ConfigInput | Config): this {
    if (isScalar(value) || value instanceof Config) {
      this.entries.set(key, value);
    } else {
      this.entries.set(key, Config.from(value));
    }
    return this;
  }

  /**
   * Set a scalar at a dotted path, creating intermediate sections.
   *
   * @throws {ConfigurationError} if an intermediate segment holds a scalar
   */
  assign(path: string, value: ConfigScalar): this {
    const segments = path.split('.');
    const last = segments.pop();
    if (last === undefined || last === '' || segments.includes('')) {
      throw new ConfigurationError(`Invalid configuration key '${path}'.`);
    }
    let target: Config = this;
    for (const segment of segments) {
      const existing = target.entries.get(segment);
      if (existing === undefined) {
        const created = new Config();
        target.entries.set(segment, created);
        target = created;
      } else if (existing instanceof Config) {
        target = existing;
      } else {
        throw new ConfigurationError(
          `Cannot assign '${path}': '${segment}' already holds a scalar value.`,
        );
      }
    }
    target.entries.set(last, value);
    return this;
  }

  /**
   * Fill-missing merge of `source` into this config (see module docs).
   * Sections copied from `source` are cloned so later writes never reach
   * back into package defaults.
   */
  mergeMissing(source: Config): this {
    for (const [key, incoming] of source.entries) {
      const existing = this.entries.get(key);
      if (existing === undefined) {
        this.entries.set(key, incoming instanceof Config ? incoming.clone() : incoming);
      } else if (existing instanceof Config && incoming instanceof Config) {
        existing.mergeMissing(incoming);
      }
    }
    return this;
  }

  clone(): Config {
    const copy = new Config();
    for (const [key, value] of this.entries) {
      copy.entries.set(key, value instanceof Config ? value.clone() : value);
    }
    return copy;
  }

  toJSON(): ConfigObject {
    const out: ConfigObject = {};
    for (const [key, value] of this.entries) {
      out[key] = value instanceof Config ? value.toJSON() : value;
    }
    return out;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function isScalar(value: unknown): value is ConfigScalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
