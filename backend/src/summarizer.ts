import { isRecord } from "./job";
import type { Logger } from "./logger";

export interface Summarizer {
  summarize(text: string): Promise<string>;
}

interface GroqConfig {
  apiKey: string;
  model: string;
  timeoutSeconds: number;
  endpoint?: string;
}

const GROQ_ENDPOINT = "https://api.groq.com/openai/v1/chat/completions";

function readCompletion(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) return undefined;
  const [first] = data.choices;
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  const { content } = first.message;
  return typeof content === "string" ? content.trim() : undefined;
}

/** LLM summary through Groq's OpenAI-compatible chat endpoint. */
export class GroqSummarizer implements Summarizer {
  constructor(
    private readonly config: GroqConfig,
    private readonly logger: Logger,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async summarize(text: string): Promise<string> {
    this.logger.info(`Requesting summary from ${this.config.model} for ${text.length} chars`);
    const response = await this.fetchImpl(this.config.endpoint ?? GROQ_ENDPOINT, {
      method: "POST",
      headers: {
        "Authorization": `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: [
          {
            role: "system",
            content: [
              "You summarize call and meeting transcripts.",
              "Do not invent facts that are not in the transcript.",
              "Answer with a short summary in the language of the transcript."
            ].join(" ")
          },
          {
            role: "user",
            content: `Summarize this transcript:\n\n${text}`
          }
        ],
        temperature: 0.1
      }),
      signal: AbortSignal.timeout(this.config.timeoutSeconds * 1000)
    });

    if (!response.ok) {
      throw new Error(`Groq API returned ${response.status} during summarization.`);
    }

    const summary = readCompletion(await response.json());
    if (!summary) {
      throw new Error("Groq API returned an empty summary.");
    }
    return summary;
  }
}

/** Used when no LLM is configured: the opening of the transcript. */
export class ExcerptSummarizer implements Summarizer {
  constructor(private readonly logger: Logger, private readonly maxChars = 500) {}

  async summarize(text: string): Promise<string> {
    const excerpt = text.length > this.maxChars ? `${text.slice(0, this.maxChars)}...` : text;
    this.logger.info(`Generated excerpt summary for ${text.length} chars`);
    return `Summary (excerpt): ${excerpt}`;
  }
}
