import type { InstanceView } from "./instance.js";

/** The part of a plugin declaration that decides which instances it accepts. */
export interface PluginCompatibility {
  readonly hosts: readonly string[];
  readonly families: readonly string[];
}

export const WILDCARD = "*";

const patternCache = new Map<string, RegExp>();

function isUnrestricted(declared: readonly string[]): boolean {
  return declared.length === 0 || declared.includes(WILDCARD);
}

function compileFamilyPattern(pattern: string): RegExp {
  let compiled = patternCache.get(pattern);
  if (!compiled) {
    const source = pattern
      .split(WILDCARD)
      .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
      .join(".*");
    compiled = new RegExp(`^${source}$`);
    patternCache.set(pattern, compiled);
  }
  return compiled;
}

/** Case-sensitive match of a family against an exact name or a `*` glob such as "test.*". */
export function matchesFamily(pattern: string, family: string): boolean {
  if (!pattern.includes(WILDCARD)) return pattern === family;
  return compileFamilyPattern(pattern).test(family);
}

export function supportsHost(plugin: PluginCompatibility, host: string | undefined): boolean {
  if (isUnrestricted(plugin.hosts)) return true;
  return host !== undefined && plugin.hosts.includes(host);
}

export function supportsFamily(plugin: PluginCompatibility, family: string | undefined): boolean {
  if (isUnrestricted(plugin.families)) return true;
  if (family === undefined) return false;
  return plugin.families.some((pattern) => matchesFamily(pattern, family));
}

/**
 * An instance missing `host` or `family` never matches a plugin that
 * restricts that dimension.
 */
export function isCompatible(plugin: PluginCompatibility, instance: InstanceView): boolean {
  return supportsHost(plugin, instance.config.host) && supportsFamily(plugin, instance.config.family);
}

export function pluginsByInstance<P extends PluginCompatibility>(
  plugins: Iterable<P>,
  instance: InstanceView,
): P[] {
  const compatible: P[] = [];
  for (const plugin of plugins) {
    if (isCompatible(plugin, instance)) compatible.push(plugin);
  }
  return compatible;
}

/** Lazily yields the instances `plugin` accepts. Single pass. */
export function* instancesByPlugin<I extends InstanceView>(
  instances: Iterable<I>,
  plugin: PluginCompatibility,
): Generator<I, void, undefined> {
  for (const instance of instances) {
    if (isCompatible(plugin, instance)) yield instance;
  }
}

/** Host rule only; selectors run before there are instances to match families against. */
export function pluginsByHost<P extends PluginCompatibility>(plugins: Iterable<P>, host: string): P[] {
  const compatible: P[] = [];
  for (const plugin of plugins) {
    if (supportsHost(plugin, host)) compatible.push(plugin);
  }
  return compatible;
}
