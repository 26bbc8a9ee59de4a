import { pathToFileURL } from "node:url";
import type { DiscoveryDiagnostic, PluginMetadata } from "@pubkit/schemas";
import { errorMessage, validatePluginDefinitionData } from "@pubkit/schemas";
import { BASE_PLUGIN_CLASSES, type PluginClass } from "./plugin.js";

export interface DiscoveredPlugin {
  plugin: PluginClass;
  metadata: PluginMetadata;
  file: string;
  export_name: string;
}

export interface LoadResult {
  plugins: DiscoveredPlugin[];
  diagnostics: DiscoveryDiagnostic[];
}

const DECLARED_KEYS = ["stage", "hosts", "families", "order", "label", "version"] as const;

/** Anything with a `process` method on its prototype is treated as a plugin candidate. */
function isPluginCandidate(value: unknown): value is PluginClass {
  if (typeof value !== "function" || BASE_PLUGIN_CLASSES.has(value)) return false;
  const proto: unknown = value.prototype;
  return typeof proto === "object" && proto !== null && "process" in proto && typeof proto.process === "function";
}

/** Reads a candidate's static declaration into a plain record for schema validation. */
export function readDeclaration(candidate: PluginClass): Record<string, unknown> {
  const declaration: Record<string, unknown> = { name: candidate.name, order: 0 };
  for (const key of DECLARED_KEYS) {
    const value: unknown = candidate[key];
    if (value === undefined) continue;
    declaration[key] = Array.isArray(value) ? [...value] : value;
  }
  return declaration;
}

export function describePlugin(candidate: PluginClass): PluginMetadata {
  const metadata: PluginMetadata = {
    name: candidate.name,
    stage: candidate.stage,
    hosts: [...candidate.hosts],
    families: [...candidate.families],
    order: candidate.order ?? 0,
  };
  if (candidate.label !== undefined) metadata.label = candidate.label;
  if (candidate.version !== undefined) metadata.version = candidate.version;
  return metadata;
}

export class PluginLoader {
  /**
   * Imports one module and collects every exported plugin class. Import
   * failures and malformed declarations become diagnostics; nothing here
   * throws.
   */
  async load(file: string): Promise<LoadResult> {
    let mod: unknown;
    try {
      mod = await import(pathToFileURL(file).href);
    } catch (err) {
      return {
        plugins: [],
        diagnostics: [{ file, error: `Failed to import plugin module: ${errorMessage(err)}` }],
      };
    }
    if (typeof mod !== "object" || mod === null) {
      return { plugins: [], diagnostics: [{ file, error: "Plugin module has no exports" }] };
    }

    const plugins: DiscoveredPlugin[] = [];
    const diagnostics: DiscoveryDiagnostic[] = [];
    const seen = new Set<unknown>();

    for (const [exportName, value] of Object.entries(mod)) {
      if (!isPluginCandidate(value) || seen.has(value)) continue;
      seen.add(value);

      const validation = validatePluginDefinitionData(readDeclaration(value));
      if (!validation.valid) {
        diagnostics.push({
          file,
          export_name: exportName,
          error: `Invalid plugin declaration: ${validation.errors.join(", ")}`,
        });
        continue;
      }
      plugins.push({ plugin: value, metadata: describePlugin(value), file, export_name: exportName });
    }

    return { plugins, diagnostics };
  }
}
