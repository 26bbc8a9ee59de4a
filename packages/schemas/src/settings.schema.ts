export const SettingsSchema = {
  type: "object",
  properties: {
    identifier_key: { type: "string", minLength: 1 },
    plugin_paths: {
      type: "array",
      items: { type: "string", minLength: 1 },
    },
    host: { type: "string", minLength: 1 },
    stages: {
      type: "array",
      minItems: 1,
      uniqueItems: true,
      items: { type: "string", minLength: 1 },
    },
    failure_policy: { type: "string", enum: ["continue", "abort"] },
    stop_on_validation_failure: { type: "boolean" },
    journal_path: { type: "string", minLength: 1 },
  },
  additionalProperties: false,
} as const;
