import { z } from "zod";
import { GatewayResponseError } from "./errors.js";
import { postJson, type HttpGatewayOptions } from "./embedding-service.js";

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionOptions {
  model?: string;
  system?: string;
  /** Earlier turns, oldest first, sent between the system prompt and `prompt`. */
  history?: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LlmGateway {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
  /**
   * Lazily yields tokens. Stopping iteration or aborting the signal closes
   * the underlying response; a new call is the only way to restart.
   */
  stream(prompt: string, options?: CompletionOptions): AsyncIterable<string>;
}

const completionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
});

const streamChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z.object({ content: z.string().nullish(), reasoning: z.string().nullish() }),
    }),
  ),
});

function linkSignals(signal: AbortSignal | undefined, timeoutMs: number | null): AbortSignal | undefined {
  const timeout = timeoutMs === null ? undefined : AbortSignal.timeout(timeoutMs);
  if (!signal || !timeout) return signal ?? timeout;
  const controller = new AbortController();
  for (const source of [signal, timeout]) {
    source.addEventListener("abort", () => controller.abort(source.reason), { once: true });
  }
  return controller.signal;
}

/** Content token carried by one SSE line, if any. */
export function parseStreamLine(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith("data: ")) return null;
  const payload = trimmed.slice(6);
  if (payload === "[DONE]") return null;

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    // keep-alive comments and partial frames carry no token
    return null;
  }
  const parsed = streamChunkSchema.safeParse(json);
  if (!parsed.success) return null;
  return parsed.data.choices[0]?.delta.content || null;
}

export class HttpLlmGateway implements LlmGateway {
  constructor(private readonly options: HttpGatewayOptions) {}

  private request(prompt: string, options: CompletionOptions, stream: boolean): Promise<Response> {
    const messages = [
      ...(options.system ? [{ role: "system", content: options.system }] : []),
      ...(options.history ?? []),
      { role: "user", content: prompt },
    ];
    // Streams run as long as the caller keeps reading; only whole completions time out.
    const signal = linkSignals(options.signal, stream ? null : this.options.timeoutMs);
    return postJson(
      `${this.options.baseUrl}/chat/completions`,
      this.options.apiKey,
      {
        model: options.model ?? this.options.model,
        messages,
        temperature: options.temperature,
        max_tokens: options.maxTokens,
        stream,
      },
      signal,
    );
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const res = await this.request(prompt, options, false);
    const parsed = completionSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new GatewayResponseError("Malformed completion response", { operation: "complete" });
    }
    return parsed.data.choices[0]?.message.content ?? "";
  }

  async *stream(prompt: string, options: CompletionOptions = {}): AsyncGenerator<string> {
    const res = await this.request(prompt, options, true);
    const body = res.body;
    if (!body) throw new GatewayResponseError("No response body", { operation: "stream" });

    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split("\n");
        buffer = lines.pop() ?? "";
        for (const line of lines) {
          const token = parseStreamLine(line);
          if (token) yield token;
        }
      }
      const tail = parseStreamLine(buffer);
      if (tail) yield tail;
    } finally {
      await reader.cancel();
    }
  }
}
