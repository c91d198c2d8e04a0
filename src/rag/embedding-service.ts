import { z } from "zod";
import { GatewayResponseError, GatewayUnavailableError } from "./errors.js";

export interface EmbeddingGateway {
  readonly model: string;
  /** One vector per text, same order. Fails as a whole. */
  embed(texts: string[]): Promise<number[][]>;
}

export interface HttpGatewayOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface HttpEmbeddingOptions extends HttpGatewayOptions {
  batchSize: number;
  concurrency: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().nonnegative().optional(),
    }),
  ),
});

/** 408, 429 and 5xx are worth retrying; anything else is a real rejection. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * POSTs JSON to an OpenAI-compatible endpoint, mapping transport failures
 * and transient statuses to GatewayUnavailableError.
 */
export async function postJson(
  url: string,
  apiKey: string,
  body: unknown,
  signal: AbortSignal | undefined,
): Promise<Response> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal,
    });
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") throw err;
    throw new GatewayUnavailableError(`Request to ${url} failed`, { operation: "http.post" }, { cause: err });
  }

  if (!res.ok) {
    const text = await res.text();
    const ErrorType = isTransientStatus(res.status) ? GatewayUnavailableError : GatewayResponseError;
    throw new ErrorType(`API error (${res.status}): ${text}`, { operation: "http.post", status: res.status });
  }
  return res;
}

export class HttpEmbeddingGateway implements EmbeddingGateway {
  readonly model: string;

  constructor(private readonly options: HttpEmbeddingOptions) {
    this.model = options.model;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    const res = await postJson(
      `${this.options.baseUrl}/embeddings`,
      this.options.apiKey,
      { model: this.model, input: batch },
      AbortSignal.timeout(this.options.timeoutMs),
    );

    const parsed = embeddingResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new GatewayResponseError("Malformed embedding response", { operation: "embed" });
    }
    const data = parsed.data.data;
    if (data.length !== batch.length) {
      throw new GatewayResponseError(`Expected ${batch.length} embeddings, got ${data.length}`, {
        operation: "embed",
      });
    }
    const ordered = data.every((d) => d.index !== undefined)
      ? [...data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      : data;
    return ordered.map((item) => item.embedding);
  }

  async embed(texts: string[]): Promise<number[][]> {
    const batches: { texts: string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += this.options.batchSize) {
      batches.push({ texts: texts.slice(i, i + this.options.batchSize), startIdx: i });
    }

    const results: number[][] = new Array(texts.length);
    let failed = false;

    // Process batches with concurrency limit; stop picking up work once one fails
    const queue = [...batches];
    const workers = Array.from(
      { length: Math.min(this.options.concurrency, queue.length) },
      async () => {
        let batch = queue.shift();
        while (batch && !failed) {
          const { startIdx } = batch;
          try {
            const embeddings = await this.embedBatch(batch.texts);
            embeddings.forEach((embedding, j) => {
              results[startIdx + j] = embedding;
            });
          } catch (err) {
            failed = true;
            throw err;
          }
          batch = queue.shift();
        }
      },
    );

    await Promise.all(workers);
    return results;
  }
}
