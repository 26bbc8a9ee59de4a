import { rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { v4 as uuid } from "uuid";
import { Journal } from "@pubkit/journal";
import { Context } from "./context.js";
import { PluginRegistry } from "./plugin-registry.js";
import { PluginDiscovery } from "./plugin-discovery.js";
import type { PluginClass, ProcessResult } from "./plugin.js";

/** Wires a registry, discovery and scratch journal for exercising plugins in tests. */
export class PluginTestHarness {
  readonly registry: PluginRegistry;
  readonly discovery: PluginDiscovery;
  readonly journal: Journal;

  private constructor(registry: PluginRegistry, discovery: PluginDiscovery, journal: Journal) {
    this.registry = registry;
    this.discovery = discovery;
    this.journal = journal;
  }

  static async create(
    pluginPaths: string[],
    options?: { extensions?: readonly string[] },
  ): Promise<PluginTestHarness> {
    const journalPath = join(tmpdir(), `pubkit-test-${uuid()}.jsonl`);
    const journal = new Journal(journalPath, { fsync: false, lock: false });
    await journal.init();

    const registry = new PluginRegistry();
    await registry.registerPluginPaths(pluginPaths);
    const discovery = new PluginDiscovery(registry, { extensions: options?.extensions, journal });
    return new PluginTestHarness(registry, discovery, journal);
  }

  /** Runs a fresh plugin object against `context` and collects every result. */
  run(plugin: PluginClass, context: Context = new Context()): ProcessResult[] {
    return [...new plugin().process(context)];
  }

  async dispose(): Promise<void> {
    await this.journal.close();
    await rm(this.journal.getFilePath(), { force: true });
  }
}
