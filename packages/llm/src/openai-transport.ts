import OpenAI from "openai";
import { MalformedResponseError, parseOpenAIChatCompletion } from "@gauntlet/schemas";
import { toCallError } from "./transport.js";
import type { ChatTransport, TransportCredential, TransportRequest, TransportResponse } from "./transport.js";

export interface OpenAITransportOptions {
  timeoutMs?: number;
  /** OpenAI-compatible endpoint, e.g. a local vLLM or Ollama server. */
  baseURL?: string;
}

export class OpenAITransport implements ChatTransport {
  private clients = new Map<string, OpenAI>();
  private options: OpenAITransportOptions;

  constructor(options: OpenAITransportOptions = {}) {
    this.options = options;
  }

  async send(credential: TransportCredential, request: TransportRequest): Promise<TransportResponse> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: "system", content: request.system },
    ];
    for (const m of request.messages) {
      messages.push(m.role === "user"
        ? { role: "user", content: m.content }
        : { role: "assistant", content: m.content });
    }

    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: request.maxTokens,
      messages,
    };
    // Chat completions have no thinking budget; reasoning models also reject a temperature
    if (!request.thinking && request.temperature !== undefined) {
      params.temperature = request.temperature;
    }

    let response: unknown;
    try {
      response = await this.clientFor(credential).chat.completions.create(params);
    } catch (err) {
      throw toCallError(err);
    }

    const parsed = parseOpenAIChatCompletion(response);
    if (!parsed.ok) {
      throw new MalformedResponseError(parsed.errors.join("; "));
    }
    const completion = parsed.value;
    const content = completion.choices[0]?.message.content ?? "";
    // Strip <think>...</think> reasoning some compatible servers inline
    const text = content.replace(/<think>[\s\S]*?<\/think>\s*/g, "").trim();

    return {
      text,
      tokensIn: completion.usage?.prompt_tokens ?? 0,
      tokensOut: completion.usage?.completion_tokens ?? 0,
      modelId: completion.model,
    };
  }

  private clientFor(credential: TransportCredential): OpenAI {
    let client = this.clients.get(credential.alias);
    if (!client) {
      client = new OpenAI({
        apiKey: credential.key,
        maxRetries: 0,
        ...(this.options.timeoutMs !== undefined ? { timeout: this.options.timeoutMs } : {}),
        ...(this.options.baseURL ? { baseURL: this.options.baseURL } : {}),
      });
      this.clients.set(credential.alias, client);
    }
    return client;
  }
}
