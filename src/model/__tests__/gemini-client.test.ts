import { describe, it, expect, vi } from "vitest";
import { GeminiClient } from "../gemini-client.js";
import { ModelProviderError, ModelRateLimitedError, ModelTimeoutError } from "../../errors.js";

const BASE = "https://llm.example.test/v1beta/";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function makeClient(fetchFn: typeof fetch, timeoutMs = 1000) {
  return new GeminiClient({
    apiKey: "test-secret",
    baseUrl: BASE,
    models: { normal: "model-normal", thinking: "model-thinking" },
    timeoutMs,
    fetchFn,
  });
}

describe("GeminiClient", () => {
  it("posts the prompt to the model for the requested type", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () =>
      jsonResponse({ candidates: [{ content: { parts: [{ text: "  hello  " }] } }] }),
    );

    const text = await makeClient(fetchFn).complete("Say hi", "thinking");

    expect(text).toBe("hello");
    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://llm.example.test/v1beta/models/model-thinking:generateContent");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({ "x-goog-api-key": "test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({
      contents: [{ role: "user", parts: [{ text: "Say hi" }] }],
    });
  });

  it("drops thought parts and joins the rest", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        candidates: [{
          content: { parts: [{ text: "thinking aloud", thought: true }, { text: "Part one. " }, { text: "Part two." }] },
        }],
      }),
    );

    await expect(makeClient(fetchFn).complete("q", "normal")).resolves.toBe("Part one. Part two.");
  });

  it("maps HTTP 429 to ModelRateLimitedError", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response("quota exceeded", { status: 429 }));

    const err = await makeClient(fetchFn).complete("q", "normal").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelRateLimitedError);
    expect(err).toHaveProperty("message", "Rate limited by model provider: quota exceeded");
  });

  it("maps other HTTP failures to ModelProviderError with the status", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response("overloaded", { status: 503 }));

    const err = await makeClient(fetchFn).complete("q", "normal").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelProviderError);
    expect(err).toHaveProperty("status", 503);
    expect(err).toHaveProperty("message", "Gemini request failed (503): overloaded");
  });

  it("rejects a response without text", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () =>
      jsonResponse({ candidates: [], promptFeedback: { blockReason: "SAFETY" } }),
    );

    await expect(makeClient(fetchFn).complete("q", "normal")).rejects.toThrow("Gemini response contained no text");
  });

  it("rejects a 2xx body that is not JSON", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response("<html>gateway</html>", { status: 200 }));

    const err = await makeClient(fetchFn).complete("q", "normal").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelProviderError);
    expect(err).toHaveProperty("status", 200);
    expect(err).toHaveProperty("message", expect.stringMatching(/^Gemini returned an unreadable response: /));
  });

  it("times out while the body is still streaming", async () => {
    const fetchFn = vi.fn<typeof fetch>(async (_url, init) =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(stream) {
            stream.enqueue(new TextEncoder().encode('{"candidates": ['));
            init?.signal?.addEventListener("abort", () => stream.error(new Error("aborted")));
          },
        }),
        { status: 200 },
      ),
    );

    const err = await makeClient(fetchFn, 20).complete("q", "normal").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelTimeoutError);
  });

  it("wraps transport failures", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });

    const err = await makeClient(fetchFn).complete("q", "normal").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelProviderError);
    expect(err).toHaveProperty("message", "Gemini request failed: TypeError: fetch failed");
  });

  it("aborts the request after the timeout", async () => {
    const fetchFn = vi.fn<typeof fetch>((_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      }),
    );

    const err = await makeClient(fetchFn, 20).complete("q", "normal").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelTimeoutError);
    expect(err).toHaveProperty("message", "Model request timed out after 20ms");
  });
});
