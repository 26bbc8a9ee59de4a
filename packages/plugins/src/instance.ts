import { v4 as uuid } from "uuid";
import { ConfigurationError, DEFAULT_SETTINGS } from "@pubkit/schemas";

export interface ReadonlyInstanceConfig {
  readonly family: string | undefined;
  readonly host: string | undefined;
  readonly identifier: boolean;
  readonly identifierKey: string;
  get(key: string): unknown;
  has(key: string): boolean;
  keys(): string[];
  toRecord(): Record<string, unknown>;
}

/** Read-only shape of an instance, handed to validators and conformers. */
export interface InstanceView extends Iterable<string> {
  readonly id: string;
  readonly name: string;
  readonly nodes: readonly string[];
  readonly length: number;
  readonly config: ReadonlyInstanceConfig;
  has(node: string): boolean;
  isIdentified(): boolean;
}

export interface InstanceOptions {
  /** Config key that maps onto `identifier`. Defaults to the settings default. */
  identifierKey?: string;
}

function optionalString(key: string, value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigurationError(`Instance config "${key}" must be a string, got ${typeof value}`);
  }
  return value;
}

/**
 * Instance metadata. `family`, `host` and the identifier are typed fields;
 * any other key lives in an open side table for plugin-specific data.
 * The generic get/set accessors route the recognised keys to the fields.
 */
export class InstanceConfig implements ReadonlyInstanceConfig {
  family: string | undefined;
  host: string | undefined;
  identifier = false;
  readonly identifierKey: string;
  private data = new Map<string, unknown>();

  constructor(identifierKey: string = DEFAULT_SETTINGS.identifier_key) {
    if (!identifierKey) {
      throw new ConfigurationError("Identifier key must be a non-empty string");
    }
    this.identifierKey = identifierKey;
  }

  static fromRecord(record: Record<string, unknown>, identifierKey?: string): InstanceConfig {
    const config = new InstanceConfig(identifierKey);
    for (const [key, value] of Object.entries(record)) {
      config.set(key, value);
    }
    return config;
  }

  get(key: string): unknown {
    if (key === "family") return this.family;
    if (key === "host") return this.host;
    if (key === this.identifierKey) return this.identifier;
    return this.data.get(key);
  }

  set(key: string, value: unknown): this {
    if (key === "family") {
      this.family = optionalString(key, value);
    } else if (key === "host") {
      this.host = optionalString(key, value);
    } else if (key === this.identifierKey) {
      this.identifier = Boolean(value);
    } else {
      this.data.set(key, value);
    }
    return this;
  }

  has(key: string): boolean {
    if (key === "family") return this.family !== undefined;
    if (key === "host") return this.host !== undefined;
    if (key === this.identifierKey) return true;
    return this.data.has(key);
  }

  delete(key: string): boolean {
    if (key === "family" || key === "host") {
      const had = this.has(key);
      this.set(key, undefined);
      return had;
    }
    if (key === this.identifierKey) {
      this.identifier = false;
      return true;
    }
    return this.data.delete(key);
  }

  keys(): string[] {
    const keys: string[] = [];
    if (this.family !== undefined) keys.push("family");
    if (this.host !== undefined) keys.push("host");
    keys.push(this.identifierKey);
    return [...keys, ...this.data.keys()];
  }

  toRecord(): Record<string, unknown> {
    const record: Record<string, unknown> = {};
    for (const key of this.keys()) {
      record[key] = this.get(key);
    }
    return record;
  }
}

/**
 * A named, ordered bundle of content nodes plus metadata. Equality is
 * reference identity; `id` exists only to correlate journal events.
 */
export class Instance implements InstanceView {
  readonly id: string;
  readonly name: string;
  readonly config: InstanceConfig;
  private readonly _nodes: string[] = [];

  constructor(name: string, options?: InstanceOptions) {
    if (!name) {
      throw new ConfigurationError("Instance name must be a non-empty string");
    }
    this.id = uuid();
    this.name = name;
    this.config = new InstanceConfig(options?.identifierKey);
  }

  /** Appends a node. Duplicates are kept; order of addition is significant. */
  add(node: string): this {
    this._nodes.push(node);
    return this;
  }

  has(node: string): boolean {
    return this._nodes.includes(node);
  }

  get nodes(): readonly string[] {
    return this._nodes;
  }

  get length(): number {
    return this._nodes.length;
  }

  isIdentified(): boolean {
    return this.config.identifier;
  }

  [Symbol.iterator](): Iterator<string> {
    return this._nodes[Symbol.iterator]();
  }

  toString(): string {
    return this.name;
  }
}
