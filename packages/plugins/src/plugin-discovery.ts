import { readdir, stat } from "node:fs/promises";
import { extname, join } from "node:path";
import { v4 as uuid } from "uuid";
import type { DiscoveryDiagnostic, StageName } from "@pubkit/schemas";
import { ConfigurationError, errorMessage } from "@pubkit/schemas";
import type { Journal } from "@pubkit/journal";
import type { PluginClass } from "./plugin.js";
import { PluginLoader, type DiscoveredPlugin } from "./plugin-loader.js";
import type { PluginRegistry } from "./plugin-registry.js";

export const DEFAULT_PLUGIN_EXTENSIONS = [".js", ".mjs"] as const;

export interface PluginDiscoveryOptions {
  /** Module file extensions to import. Default: .js, .mjs */
  extensions?: readonly string[];
  loader?: PluginLoader;
  /** When set, discoveries and failures are journaled. */
  journal?: Journal;
}

export interface DiscoverOptions {
  /** Stage tag to keep; omitted means every stage. */
  type?: StageName;
  /** Matched against the class name from its first character; add `$` to anchor the end. */
  regex?: string | RegExp;
  /** Journal run to record events under. A fresh id is used when omitted. */
  runId?: string;
}

function compileNameFilter(regex: string | RegExp): RegExp {
  const source = typeof regex === "string" ? regex : regex.source;
  const flags = typeof regex === "string" ? "" : regex.flags.replace(/[gy]/g, "");
  try {
    return new RegExp(`^(?:${source})`, flags);
  } catch (err) {
    throw new ConfigurationError(`Invalid plugin name pattern "${source}": ${errorMessage(err)}`, { cause: err });
  }
}

function compareDiscovered(a: DiscoveredPlugin, b: DiscoveredPlugin): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.metadata.name !== b.metadata.name) return a.metadata.name < b.metadata.name ? -1 : 1;
  return 0;
}

/**
 * Finds plugin classes in the registry's directories. Every call rescans
 * the currently registered paths; nothing is cached between calls, so
 * registry changes are visible immediately.
 */
export class PluginDiscovery {
  private registry: PluginRegistry;
  private loader: PluginLoader;
  private extensions: readonly string[];
  private journal: Journal | undefined;
  private diagnostics: DiscoveryDiagnostic[] = [];

  constructor(registry: PluginRegistry, options?: PluginDiscoveryOptions) {
    this.registry = registry;
    this.loader = options?.loader ?? new PluginLoader();
    this.extensions = options?.extensions ?? DEFAULT_PLUGIN_EXTENSIONS;
    this.journal = options?.journal;
  }

  async discover(options?: DiscoverOptions): Promise<PluginClass[]> {
    const entries = await this.discoverEntries(options);
    return entries.map((e) => e.plugin);
  }

  /**
   * Like discover, with the file, export name and validated metadata of
   * each plugin. Ordered by defining file, then class name.
   */
  async discoverEntries(options?: DiscoverOptions): Promise<DiscoveredPlugin[]> {
    const nameFilter = options?.regex !== undefined ? compileNameFilter(options.regex) : null;
    const runId = options?.runId ?? uuid();
    const diagnostics: DiscoveryDiagnostic[] = [];
    const files = new Set<string>();

    for (const dir of this.registry.registeredPaths()) {
      try {
        for (const file of await this.scanDirectory(dir)) files.add(file);
      } catch (err) {
        diagnostics.push({ file: dir, error: `Failed to scan plugin path: ${errorMessage(err)}` });
      }
    }

    const discovered: DiscoveredPlugin[] = [];
    const seen = new Set<PluginClass>();
    for (const file of [...files].sort()) {
      const result = await this.loader.load(file);
      diagnostics.push(...result.diagnostics);
      for (const entry of result.plugins) {
        if (seen.has(entry.plugin)) continue;
        seen.add(entry.plugin);
        if (options?.type !== undefined && entry.metadata.stage !== options.type) continue;
        if (nameFilter && !nameFilter.test(entry.metadata.name)) continue;
        discovered.push(entry);
      }
    }
    discovered.sort(compareDiscovered);

    this.diagnostics = diagnostics;
    await this.record(runId, discovered, diagnostics);
    return discovered;
  }

  /** Failures collected by the most recent discovery call. */
  lastDiagnostics(): DiscoveryDiagnostic[] {
    return [...this.diagnostics];
  }

  /**
   * Candidate module files directly inside `dir`, sorted. Not recursive.
   * Symlinks to files are followed; a dangling link is kept so its failed
   * import shows up in the diagnostics.
   */
  async scanDirectory(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries) {
      if (!this.isCandidate(entry.name)) continue;
      const file = join(dir, entry.name);
      if (entry.isSymbolicLink()) {
        const target = await stat(file).catch(() => undefined);
        if (target !== undefined && !target.isFile()) continue;
      } else if (!entry.isFile()) {
        continue;
      }
      files.push(file);
    }
    return files.sort();
  }

  private isCandidate(fileName: string): boolean {
    if (fileName.startsWith("_") || fileName.startsWith(".")) return false;
    if (/\.d\.[cm]?ts$/.test(fileName) || /\.(test|spec)\.[^.]+$/.test(fileName)) return false;
    return this.extensions.includes(extname(fileName));
  }

  private async record(
    runId: string,
    discovered: DiscoveredPlugin[],
    diagnostics: DiscoveryDiagnostic[],
  ): Promise<void> {
    for (const diagnostic of diagnostics) {
      const where = diagnostic.export_name ? `${diagnostic.file}#${diagnostic.export_name}` : diagnostic.file;
      console.warn(`[plugin-discovery] ${where}: ${diagnostic.error}`);
      await this.journal?.tryEmit(runId, "plugin.failed", { ...diagnostic });
    }
    if (!this.journal) return;
    for (const entry of discovered) {
      await this.journal.tryEmit(runId, "plugin.discovered", {
        plugin: entry.metadata.name,
        stage: entry.metadata.stage,
        file: entry.file,
      });
    }
  }
}
