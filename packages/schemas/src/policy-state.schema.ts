import { ACTION_TYPES } from "./types.js";

const actionKeys = { enum: [...ACTION_TYPES] };

export const ActionPreferencesSchema = {
  type: "object",
  propertyNames: actionKeys,
  additionalProperties: { type: "number", minimum: 0, maximum: 1 },
} as const;

export const BanditStatsSchema = {
  type: "object",
  propertyNames: actionKeys,
  additionalProperties: {
    type: "object",
    required: ["total_reward", "plays"],
    properties: {
      total_reward: { type: "number" },
      plays: { type: "integer", minimum: 0 },
    },
    additionalProperties: false,
  },
} as const;

export const OpponentModelsSchema = {
  type: "object",
  additionalProperties: {
    type: "object",
    propertyNames: actionKeys,
    additionalProperties: { type: "integer" },
  },
} as const;

export const EmbeddingSchema = {
  type: "array",
  items: { type: "number" },
} as const;
