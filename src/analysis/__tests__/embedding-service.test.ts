import { afterEach, describe, it, expect, vi } from "vitest";
import { OpenRouterEmbeddingProvider, validateVector } from "../embedding-service.js";
import { EmbeddingError } from "../errors.js";
import { RelevanceRanker } from "../ranking/ranker.js";
import { section, task } from "./fixtures.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OpenRouterEmbeddingProvider", () => {
  const provider = new OpenRouterEmbeddingProvider({
    apiKey: "test-key",
    model: "test-model",
    url: "http://embeddings.test/v1/embeddings",
  });

  it("posts the texts and returns vectors in input order", async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({
        data: [
          { embedding: [0, 1], index: 1 },
          { embedding: [1, 0], index: 0 },
        ],
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(provider.embedMany(["first", "second"])).resolves.toEqual([
      [1, 0],
      [0, 1],
    ]);

    expect(fetchMock).toHaveBeenCalledWith("http://embeddings.test/v1/embeddings", {
      method: "POST",
      headers: {
        Authorization: "Bearer test-key",
        "Content-Type": "application/json",
      },
      body: JSON.stringify({ model: "test-model", input: ["first", "second"] }),
    });
  });

  it("embeds a single text", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ data: [{ embedding: [0.5, 0.5] }] })));
    await expect(provider.embed("hello")).resolves.toEqual([0.5, 0.5]);
  });

  it("rejects empty text without calling the API", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    await expect(provider.embed("  ")).rejects.toThrow("Cannot embed empty text");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("surfaces API errors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("rate limited", { status: 429 })));
    await expect(provider.embed("hello")).rejects.toThrow("Embedding API error (429): rate limited");
  });

  it("rejects a response with the wrong number of vectors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ data: [{ embedding: [1] }] })));
    await expect(provider.embedMany(["a", "b"])).rejects.toThrow(
      "Embedding API returned 1 vectors for 2 inputs",
    );
  });

  it("reports an error object sent with a 200 status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ error: { message: "No successful provider responses" } })),
    );

    const err = await provider.embed("hello").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingError);
    expect(err).toHaveProperty("message", "Embedding API error: No successful provider responses");
  });

  it("fails the ranking with the API message when the focus query gets an error body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ error: { message: "No successful provider responses" } })),
    );

    await expect(new RelevanceRanker(provider).rank([section("A", "b")], task())).rejects.toThrow(
      new EmbeddingError("Embedding API error: No successful provider responses"),
    );
  });

  it("rejects a response body without vectors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ object: "list" })));
    await expect(provider.embed("hello")).rejects.toThrow(
      "Malformed embedding response (data: Required)",
    );
  });

  it("rejects a body that is not JSON", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html>", { status: 200 })));
    await expect(provider.embed("hello")).rejects.toBeInstanceOf(EmbeddingError);
  });

  it("skips the API for an empty batch", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    await expect(provider.embedMany([])).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("validateVector", () => {
  it("accepts finite numbers", () => {
    expect(validateVector([1, -2.5, 0])).toEqual([1, -2.5, 0]);
  });

  it("rejects empty, non-finite and mis-sized vectors", () => {
    expect(() => validateVector([])).toThrow(EmbeddingError);
    expect(() => validateVector([1, Number.NaN])).toThrow("Embedding contains non-finite values");
    expect(() => validateVector("nope")).toThrow("Embedding is not a non-empty vector");
    expect(() => validateVector([1, 2], 3)).toThrow("Embedding has 2 dimensions, expected 3");
  });
});
