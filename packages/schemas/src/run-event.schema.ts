export const RunEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "run_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    run_id: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "recording.started", "episode.reset", "recording.completed",
        "replay.started", "replay.completed", "frames.exported",
      ],
    },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
