export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "scope_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    scope_id: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "llm.call.succeeded", "llm.call.retry", "llm.call.failed",
        "credential.cooldown",
        "prompt.seeded", "prompt.evolved", "prompt.pruned",
        "policy.saved", "game.reflected",
      ],
    },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
