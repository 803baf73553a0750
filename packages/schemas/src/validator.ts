import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { JournalEventSchema } from "./journal-event.schema.js";
import {
  ActionPreferencesSchema,
  BanditStatsSchema,
  OpponentModelsSchema,
  EmbeddingSchema,
} from "./policy-state.schema.js";
import { AnthropicMessageSchema, OpenAIChatCompletionSchema } from "./provider-response.schema.js";
import type { ActionMap, BanditArm, JournalEvent } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats is CommonJS; under ESM the plugin sits on .default
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface AnthropicMessageShape {
  model: string;
  content: Array<{ type: string; text?: unknown }>;
  usage: { input_tokens: number; output_tokens: number };
}

export interface OpenAIChatCompletionShape {
  model: string;
  choices: Array<{ message: { content?: string | null } }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number };
}

const validateJournalEvent = ajv.compile<JournalEvent>(JournalEventSchema);
const validateActionPreferences = ajv.compile<ActionMap<number>>(ActionPreferencesSchema);
const validateBanditStats = ajv.compile<ActionMap<BanditArm>>(BanditStatsSchema);
const validateOpponentModels = ajv.compile<Record<string, ActionMap<number>>>(OpponentModelsSchema);
const validateEmbedding = ajv.compile<number[]>(EmbeddingSchema);
const validateAnthropicMessage = ajv.compile<AnthropicMessageShape>(AnthropicMessageSchema);
const validateOpenAIChatCompletion = ajv.compile<OpenAIChatCompletionShape>(OpenAIChatCompletionSchema);

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

/** Either the typed value or the list of reasons it was rejected. */
export type Parsed<T> = { ok: true; value: T } | { ok: false; errors: string[] };

function parseWith<T>(validate: ValidateFunction<T>, data: unknown): Parsed<T> {
  if (validate(data)) return { ok: true, value: data };
  return { ok: false, errors: toResult(false, validate.errors).errors };
}

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}

export function parseActionPreferences(data: unknown): Parsed<ActionMap<number>> {
  return parseWith(validateActionPreferences, data);
}

export function parseBanditStats(data: unknown): Parsed<ActionMap<BanditArm>> {
  return parseWith(validateBanditStats, data);
}

export function parseOpponentModels(data: unknown): Parsed<Record<string, ActionMap<number>>> {
  return parseWith(validateOpponentModels, data);
}

export function parseEmbedding(data: unknown): Parsed<number[]> {
  return parseWith(validateEmbedding, data);
}

export function parseAnthropicMessage(data: unknown): Parsed<AnthropicMessageShape> {
  return parseWith(validateAnthropicMessage, data);
}

export function parseOpenAIChatCompletion(data: unknown): Parsed<OpenAIChatCompletionShape> {
  return parseWith(validateOpenAIChatCompletion, data);
}

/** JSON.parse that reports failure instead of throwing. */
export function parseJson(text: string): Parsed<unknown> {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, errors: [err instanceof Error ? err.message : String(err)] };
  }
}
