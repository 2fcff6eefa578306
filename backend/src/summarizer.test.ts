import { describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger";
import { ExcerptSummarizer, GroqSummarizer } from "./summarizer";

const logger = createLogger("test", { write: () => undefined });

function groqWith(response: Response) {
  const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response);
  const summarizer = new GroqSummarizer(
    { apiKey: "test-key", model: "llama-3.1-8b-instant", timeoutSeconds: 5, endpoint: "https://llm.test/v1/chat" },
    logger,
    fetchImpl
  );
  return { summarizer, fetchImpl };
}

describe("GroqSummarizer", () => {
  it("returns the trimmed completion", async () => {
    const { summarizer, fetchImpl } = groqWith(
      new Response(JSON.stringify({ choices: [{ message: { content: "  Customer asked for a refund.  " } }] }), {
        status: 200
      })
    );

    await expect(summarizer.summarize("I want my money back.")).resolves.toBe("Customer asked for a refund.");

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/chat");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-key" });
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe("llama-3.1-8b-instant");
    expect(body.messages[1].content).toBe("Summarize this transcript:\n\nI want my money back.");
  });

  it("fails on a non-success status", async () => {
    const { summarizer } = groqWith(new Response("rate limited", { status: 429 }));

    await expect(summarizer.summarize("text")).rejects.toThrow("Groq API returned 429 during summarization.");
  });

  it("fails on an empty completion", async () => {
    const { summarizer } = groqWith(new Response(JSON.stringify({ choices: [] }), { status: 200 }));

    await expect(summarizer.summarize("text")).rejects.toThrow("Groq API returned an empty summary.");
  });
});

describe("ExcerptSummarizer", () => {
  it("returns short transcripts whole", async () => {
    await expect(new ExcerptSummarizer(logger).summarize("Short call.")).resolves.toBe("Summary (excerpt): Short call.");
  });

  it("truncates long transcripts", async () => {
    const summary = await new ExcerptSummarizer(logger, 10).summarize("abcdefghijklmnop");

    expect(summary).toBe("Summary (excerpt): abcdefghij...");
  });
});
