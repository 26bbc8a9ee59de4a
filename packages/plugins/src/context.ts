import { DEFAULT_SETTINGS } from "@pubkit/schemas";
import { Instance, type InstanceOptions } from "./instance.js";

/**
 * The mutable collection of instances for one publishing run. Behaves like
 * a list: append, pop from the end, identity membership, insertion-order
 * iteration.
 */
export class Context implements Iterable<Instance> {
  private readonly instances: Instance[] = [];
  /** Identifier key given to instances made through `createInstance`. */
  readonly identifierKey: string;

  constructor(options?: InstanceOptions) {
    this.identifierKey = options?.identifierKey ?? DEFAULT_SETTINGS.identifier_key;
  }

  /** A new instance using this context's identifier key. Not added. */
  createInstance(name: string): Instance {
    return new Instance(name, { identifierKey: this.identifierKey });
  }

  add(instance: Instance): this {
    this.instances.push(instance);
    return this;
  }

  /** Removes and returns the most recently added instance. */
  pop(): Instance | undefined {
    return this.instances.pop();
  }

  has(instance: Instance): boolean {
    return this.instances.includes(instance);
  }

  get length(): number {
    return this.instances.length;
  }

  find(name: string): Instance | undefined {
    return this.instances.find((i) => i.name === name);
  }

  *identified(): Generator<Instance, void, undefined> {
    for (const instance of this.instances) {
      if (instance.isIdentified()) yield instance;
    }
  }

  /**
   * A new context holding the instances that satisfy `predicate`. The
   * instances themselves are shared, not copied.
   */
  subset(predicate: (instance: Instance) => boolean): Context {
    const scoped = new Context({ identifierKey: this.identifierKey });
    for (const instance of this.instances) {
      if (predicate(instance)) scoped.add(instance);
    }
    return scoped;
  }

  [Symbol.iterator](): Iterator<Instance> {
    return this.instances[Symbol.iterator]();
  }
}
