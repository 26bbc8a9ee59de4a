import { access, constants, realpath, stat } from "node:fs/promises";
import { resolve } from "node:path";
import type { Stats } from "node:fs";
import type { Settings } from "@pubkit/schemas";
import { ConfigurationError, errorMessage } from "@pubkit/schemas";

/** The set of directories scanned for plugin modules. Paths are validated when registered. */
export class PluginRegistry {
  private paths = new Set<string>();
  /** Resolved path as registered, to the directory it names with links followed. */
  private aliases = new Map<string, string>();

  /**
   * Registers a directory and returns its absolute form with symlinks
   * resolved. Registering the same directory again, by any path, is a no-op.
   */
  async registerPluginPath(path: string): Promise<string> {
    if (!path) {
      throw new ConfigurationError("Plugin path must be a non-empty string");
    }
    const absolute = resolve(path);
    const known = this.aliases.get(absolute);
    if (known !== undefined) return known;

    let info: Stats;
    try {
      info = await stat(absolute);
    } catch (err) {
      throw new ConfigurationError(`Plugin path does not exist: ${absolute}`, { cause: err });
    }
    if (!info.isDirectory()) {
      throw new ConfigurationError(`Plugin path is not a directory: ${absolute}`);
    }
    try {
      await access(absolute, constants.R_OK | constants.X_OK);
    } catch (err) {
      throw new ConfigurationError(`Plugin path is not readable: ${absolute} (${errorMessage(err)})`, { cause: err });
    }

    const canonical = await realpath(absolute);
    this.aliases.set(absolute, canonical);
    this.paths.add(canonical);
    return canonical;
  }

  async registerPluginPaths(paths: Iterable<string>): Promise<string[]> {
    const registered: string[] = [];
    for (const path of paths) {
      registered.push(await this.registerPluginPath(path));
    }
    return registered;
  }

  /** Seeds the registry from settings (which already include PUBKIT_PLUGIN_PATH). */
  async registerFromSettings(settings: Pick<Settings, "plugin_paths">): Promise<string[]> {
    return this.registerPluginPaths(settings.plugin_paths);
  }

  deregisterPluginPath(path: string): boolean {
    const absolute = resolve(path);
    const canonical = this.aliases.get(absolute) ?? absolute;
    for (const [alias, target] of this.aliases) {
      if (target === canonical) this.aliases.delete(alias);
    }
    return this.paths.delete(canonical);
  }

  deregisterAll(): void {
    this.paths.clear();
    this.aliases.clear();
  }

  registeredPaths(): string[] {
    return [...this.paths];
  }

  get size(): number {
    return this.paths.size;
  }
}
