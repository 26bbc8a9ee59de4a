import Ajv, { type ErrorObject } from "ajv";
import addFormats from "ajv-formats";
import { PluginDefinitionSchema } from "./plugin-definition.schema.js";
import { SettingsSchema } from "./settings.schema.js";
import { JournalEventSchema } from "./journal-event.schema.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats exposes a nested .default under ESM because of CJS interop
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const validatePluginDefinition = ajv.compile(PluginDefinitionSchema);
const validateSettings = ajv.compile(SettingsSchema);
const validateJournalEvent = ajv.compile(JournalEventSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validatePluginDefinitionData(data: unknown): ValidationResult {
  const valid = validatePluginDefinition(data);
  return toResult(valid, validatePluginDefinition.errors);
}

export function validateSettingsData(data: unknown): ValidationResult {
  const valid = validateSettings(data);
  return toResult(valid, validateSettings.errors);
}

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}
