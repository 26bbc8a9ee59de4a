export {
  Instance,
  InstanceConfig,
  type InstanceView,
  type InstanceOptions,
  type ReadonlyInstanceConfig,
} from "./instance.js";
export { Context } from "./context.js";
export {
  Plugin,
  InstancePlugin,
  Selector,
  Validator,
  Extractor,
  Conformer,
  BASE_PLUGIN_CLASSES,
  escalate,
  type ProcessResult,
  type PluginLike,
  type PluginClass,
} from "./plugin.js";
export {
  WILDCARD,
  matchesFamily,
  supportsHost,
  supportsFamily,
  isCompatible,
  pluginsByInstance,
  instancesByPlugin,
  pluginsByHost,
  type PluginCompatibility,
} from "./compatibility.js";
export { PluginRegistry } from "./plugin-registry.js";
export { PluginLoader, readDeclaration, describePlugin, type DiscoveredPlugin, type LoadResult } from "./plugin-loader.js";
export {
  PluginDiscovery,
  DEFAULT_PLUGIN_EXTENSIONS,
  type PluginDiscoveryOptions,
  type DiscoverOptions,
} from "./plugin-discovery.js";
export { PluginLoggerImpl, type PluginLoggerOptions } from "./plugin-logger.js";
export { PluginTestHarness } from "./plugin-test-harness.js";
