import axios from "axios";
import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import { buildExtractionPrompt } from "../../prompts/extraction.js";

dayjs.extend(utc);
dayjs.extend(timezone);

const DEFAULT_MODEL = "gpt-4o-mini";
const COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";

export interface ExtractionContext {
  now: Date;
  timeZone: string;
  signal?: AbortSignal;
}

/**
 * Anything that can turn raw text into `{ title, date, time, durationMinutes }`.
 * The result is untrusted; callers validate it before use.
 */
export interface StructuredExtractor {
  extract(text: string, context: ExtractionContext): Promise<unknown>;
}

export class ExternalParserError extends Error {
  constructor(
    public code: "external_parser_not_configured" | "external_parser_empty" | "external_parser_malformed",
    message: string
  ) {
    super(message);
    this.name = "ExternalParserError";
  }
}

export interface OpenAiExtractorOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

export class OpenAiExtractor implements StructuredExtractor {
  private apiKey: string;
  private model: string;
  private timeoutMs: number;

  constructor(options: OpenAiExtractorOptions) {
    if (!options.apiKey) {
      throw new ExternalParserError("external_parser_not_configured", "OPENAI_API_KEY is missing");
    }
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? 4000;
  }

  async extract(text: string, context: ExtractionContext): Promise<unknown> {
    const nowISO = dayjs(context.now).tz(context.timeZone).format("YYYY-MM-DDTHH:mm:ss");
    const response = await axios.post(
      COMPLETIONS_URL,
      {
        model: this.model,
        temperature: 0,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: buildExtractionPrompt(nowISO, context.timeZone) },
          { role: "user", content: `User message:\n${text}\n\nReturn ONLY the JSON object.` },
        ],
      },
      {
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        timeout: this.timeoutMs,
        signal: context.signal,
      }
    );

    const content: unknown = response.data?.choices?.[0]?.message?.content;
    if (typeof content !== "string" || !content.trim()) {
      throw new ExternalParserError("external_parser_empty", "No content returned from OpenAI");
    }
    try {
      return JSON.parse(content);
    } catch {
      throw new ExternalParserError("external_parser_malformed", "OpenAI returned malformed JSON");
    }
  }
}
