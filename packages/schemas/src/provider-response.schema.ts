/**
 * Minimal shapes the call layer relies on. Anything beyond these fields
 * is ignored; anything missing is a malformed response.
 */

export const AnthropicMessageSchema = {
  type: "object",
  required: ["model", "content", "usage"],
  properties: {
    model: { type: "string" },
    content: {
      type: "array",
      items: {
        type: "object",
        required: ["type"],
        properties: { type: { type: "string" } },
      },
    },
    usage: {
      type: "object",
      required: ["input_tokens", "output_tokens"],
      properties: {
        input_tokens: { type: "integer", minimum: 0 },
        output_tokens: { type: "integer", minimum: 0 },
      },
    },
  },
} as const;

export const OpenAIChatCompletionSchema = {
  type: "object",
  required: ["model", "choices"],
  properties: {
    model: { type: "string" },
    choices: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["message"],
        properties: {
          message: {
            type: "object",
            properties: { content: { type: ["string", "null"] } },
          },
        },
      },
    },
    usage: {
      type: "object",
      properties: {
        prompt_tokens: { type: "integer", minimum: 0 },
        completion_tokens: { type: "integer", minimum: 0 },
      },
    },
  },
} as const;
