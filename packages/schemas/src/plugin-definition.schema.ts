export const PluginDefinitionSchema = {
  type: "object",
  required: ["name", "stage", "hosts", "families", "order"],
  properties: {
    name: { type: "string", minLength: 1, pattern: "^[A-Za-z_$][A-Za-z0-9_$]*$" },
    stage: { type: "string", minLength: 1, pattern: "^[a-z][a-z0-9_-]*$" },
    hosts: {
      type: "array",
      items: { type: "string", minLength: 1 },
    },
    families: {
      type: "array",
      items: { type: "string", minLength: 1 },
    },
    order: { type: "number" },
    label: { type: "string" },
    version: { type: "string", minLength: 1 },
  },
  additionalProperties: false,
} as const;
