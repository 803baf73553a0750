import Anthropic from "@anthropic-ai/sdk";
import { MalformedResponseError, parseAnthropicMessage } from "@gauntlet/schemas";
import { toCallError } from "./transport.js";
import type { ChatTransport, TransportCredential, TransportRequest, TransportResponse } from "./transport.js";

export interface AnthropicTransportOptions {
  timeoutMs?: number;
  baseURL?: string;
}

export class AnthropicTransport implements ChatTransport {
  // One client per credential for HTTP connection reuse
  private clients = new Map<string, Anthropic>();
  private options: AnthropicTransportOptions;

  constructor(options: AnthropicTransportOptions = {}) {
    this.options = options;
  }

  async send(credential: TransportCredential, request: TransportRequest): Promise<TransportResponse> {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: request.maxTokens,
      system: request.system,
      messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
    };
    if (request.thinking) {
      params.thinking = { type: "enabled", budget_tokens: request.thinking.budgetTokens };
    } else if (request.temperature !== undefined) {
      params.temperature = request.temperature;
    }

    let response: unknown;
    try {
      response = await this.clientFor(credential).messages.create(params);
    } catch (err) {
      throw toCallError(err);
    }

    const parsed = parseAnthropicMessage(response);
    if (!parsed.ok) {
      throw new MalformedResponseError(parsed.errors.join("; "));
    }
    const message = parsed.value;
    const text = message.content
      .filter((block) => block.type === "text")
      .map((block) => (typeof block.text === "string" ? block.text : ""))
      .join("\n")
      .trim();

    return {
      text,
      tokensIn: message.usage.input_tokens,
      tokensOut: message.usage.output_tokens,
      modelId: message.model,
    };
  }

  private clientFor(credential: TransportCredential): Anthropic {
    let client = this.clients.get(credential.alias);
    if (!client) {
      client = new Anthropic({
        apiKey: credential.key,
        // Retries belong to the call layer so every failure reaches the pool
        maxRetries: 0,
        ...(this.options.timeoutMs !== undefined ? { timeout: this.options.timeoutMs } : {}),
        ...(this.options.baseURL ? { baseURL: this.options.baseURL } : {}),
      });
      this.clients.set(credential.alias, client);
    }
    return client;
  }
}
