export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "run_id", "type", "payload"],
  properties: {
    event_id: { type: "string", format: "uuid" },
    timestamp: { type: "string", format: "date-time" },
    run_id: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "publish.started", "publish.completed", "publish.aborted",
        "stage.started", "stage.completed", "stage.skipped",
        "plugin.discovered", "plugin.failed", "plugin.crashed",
        "instance.processed", "instance.failed",
      ],
    },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
