import type { PluginLogger, StageName } from "@pubkit/schemas";
import { toError } from "@pubkit/schemas";
import type { Context } from "./context.js";
import type { Instance, InstanceView } from "./instance.js";
import { instancesByPlugin, type PluginCompatibility } from "./compatibility.js";
import { PluginLoggerImpl } from "./plugin-logger.js";

/**
 * Outcome of processing one instance. A selector that fails before it
 * produced an instance reports `instance: null`.
 */
export type ProcessResult =
  | { ok: true; instance: Instance }
  | { ok: false; instance: Instance | null; error: Error };

/** What the pipeline needs from a constructed plugin. */
export interface PluginLike {
  process(context: Context): Iterable<ProcessResult>;
}

/** What discovery returns: a plugin type carrying its declaration as statics. */
export interface PluginClass extends PluginCompatibility {
  new (): PluginLike;
  readonly name: string;
  readonly stage: StageName;
  readonly order?: number;
  readonly label?: string;
  readonly version?: string;
}

/**
 * Re-throws the error of a failed result. Turning a recoverable
 * per-instance failure into an abort is the caller's decision.
 */
export function escalate(result: ProcessResult): Instance | null {
  if (!result.ok) throw result.error;
  return result.instance;
}

export abstract class Plugin implements PluginLike, PluginCompatibility {
  static readonly stage: StageName = "plugins";
  static hosts: readonly string[] = [];
  static families: readonly string[] = [];
  static order = 0;
  static label?: string;
  static version?: string;

  readonly name: string;
  readonly hosts: readonly string[];
  readonly families: readonly string[];
  readonly log: PluginLogger;

  constructor() {
    const declared = new.target;
    this.name = declared.name;
    this.hosts = [...declared.hosts];
    this.families = [...declared.families];
    this.log = new PluginLoggerImpl(declared.name);
  }

  /**
   * Lazily yields one result per instance handled. Per-instance failures
   * are yielded, never thrown, so later instances still get processed.
   */
  abstract process(context: Context): Generator<ProcessResult, void, undefined>;
}

/** Base for stages that visit each compatible instance already in the context. */
export abstract class InstancePlugin extends Plugin {
  *process(context: Context): Generator<ProcessResult, void, undefined> {
    for (const instance of instancesByPlugin(context, this)) {
      let result: ProcessResult;
      try {
        this.processInstance(instance);
        result = { ok: true, instance };
      } catch (err) {
        const error = toError(err);
        this.log.debug(`failed on "${instance.name}": ${error.message}`);
        result = { ok: false, instance, error };
      }
      yield result;
    }
  }

  protected abstract processInstance(instance: Instance): void;
}

/**
 * Creates instances. Each instance yielded by `select` is appended to the
 * context before it is reported; existing instances are never touched.
 */
export abstract class Selector extends Plugin {
  static readonly stage: StageName = "selectors";

  abstract select(context: Context): Iterable<Instance>;

  *process(context: Context): Generator<ProcessResult, void, undefined> {
    let iterator: Iterator<Instance>;
    try {
      iterator = this.select(context)[Symbol.iterator]();
    } catch (err) {
      yield { ok: false, instance: null, error: toError(err) };
      return;
    }

    while (true) {
      let step: IteratorResult<Instance>;
      try {
        step = iterator.next();
      } catch (err) {
        yield { ok: false, instance: null, error: toError(err) };
        return;
      }
      if (step.done) return;
      context.add(step.value);
      yield { ok: true, instance: step.value };
    }
  }
}

/** Checks instances without changing them; failures are raised as errors from `validate`. */
export abstract class Validator extends InstancePlugin {
  static readonly stage: StageName = "validators";

  abstract validate(instance: InstanceView): void;

  protected processInstance(instance: Instance): void {
    this.validate(instance);
  }
}

/** Performs the externally visible publishing action for each instance. */
export abstract class Extractor extends InstancePlugin {
  static readonly stage: StageName = "extractors";

  abstract extract(instance: Instance): void;

  protected processInstance(instance: Instance): void {
    this.extract(instance);
  }
}

/** Terminal stage: tells external systems about published instances. */
export abstract class Conformer extends InstancePlugin {
  static readonly stage: StageName = "conformers";

  abstract conform(instance: InstanceView): void;

  protected processInstance(instance: Instance): void {
    this.conform(instance);
  }
}

/** Base classes are building blocks, never discovered as plugins themselves. */
export const BASE_PLUGIN_CLASSES: ReadonlySet<unknown> = new Set<unknown>([
  Plugin,
  InstancePlugin,
  Selector,
  Validator,
  Extractor,
  Conformer,
]);
