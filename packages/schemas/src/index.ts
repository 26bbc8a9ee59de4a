export * from "./types.js";
export * from "./errors.js";
export {
  validatePluginDefinitionData,
  validateSettingsData,
  validateJournalEventData,
  type ValidationResult,
} from "./validator.js";
export {
  DEFAULT_SETTINGS,
  SETTINGS_FILE_NAME,
  parseSettings,
  parsePluginPathVariable,
  applyEnvironment,
  loadSettings,
} from "./settings.js";
export { PluginDefinitionSchema } from "./plugin-definition.schema.js";
export { SettingsSchema } from "./settings.schema.js";
export { JournalEventSchema } from "./journal-event.schema.js";
