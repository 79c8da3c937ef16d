import { z } from "zod";
import { ANALYSIS_CONFIG } from "./config.js";
import { EmbeddingError } from "./errors.js";

const OPENROUTER_EMBEDDINGS_URL = "https://openrouter.ai/api/v1/embeddings";

export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string): Promise<number[]>;
  /** Optional batched form; must return one vector per input, in order. */
  embedMany?(texts: string[]): Promise<number[][]>;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().optional(),
    }),
  ),
});

// OpenRouter can answer 200 with only an error object when no provider responds.
const errorResponseSchema = z.object({
  error: z.object({ message: z.string() }),
});

function parseEmbeddingResponse(body: unknown): z.infer<typeof embeddingResponseSchema>["data"] {
  const parsed = embeddingResponseSchema.safeParse(body);
  if (parsed.success) return parsed.data.data;

  const apiError = errorResponseSchema.safeParse(body);
  if (apiError.success) {
    throw new EmbeddingError(`Embedding API error: ${apiError.data.error.message}`);
  }
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  throw new EmbeddingError(`Malformed embedding response (${where}${issue?.message ?? "invalid"})`);
}

export interface OpenRouterEmbeddingOptions {
  apiKey: string;
  model?: string;
  url?: string;
}

export class OpenRouterEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  private readonly apiKey: string;
  private readonly url: string;

  constructor(options: OpenRouterEmbeddingOptions) {
    this.apiKey = options.apiKey;
    this.name = options.model ?? ANALYSIS_CONFIG.embeddingModel;
    this.url = options.url ?? OPENROUTER_EMBEDDINGS_URL;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedMany([text]);
    if (!embedding) throw new EmbeddingError("Embedding API returned no vector");
    return embedding;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    if (texts.some((t) => !t.trim())) {
      throw new EmbeddingError("Cannot embed empty text");
    }

    const res = await fetch(this.url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.name,
        input: texts,
      }),
    });

    if (!res.ok) {
      const body = await res.text();
      throw new EmbeddingError(`Embedding API error (${res.status}): ${body}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new EmbeddingError(`Embedding API returned invalid JSON: ${msg}`, { cause: err });
    }
    const data = parseEmbeddingResponse(body);
    if (data.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding API returned ${data.length} vectors for ${texts.length} inputs`,
      );
    }
    // The API may reorder items; `index` points back at the input.
    const ordered = [...data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return ordered.map((item) => item.embedding);
  }
}

export function validateVector(vector: unknown, dimensions?: number): number[] {
  if (!Array.isArray(vector) || vector.length === 0) {
    throw new EmbeddingError("Embedding is not a non-empty vector");
  }
  const values: number[] = [];
  for (const value of vector) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new EmbeddingError("Embedding contains non-finite values");
    }
    values.push(value);
  }
  if (dimensions !== undefined && values.length !== dimensions) {
    throw new EmbeddingError(
      `Embedding has ${values.length} dimensions, expected ${dimensions}`,
    );
  }
  return values;
}
