import { describe, it, expect, vi, afterEach } from "vitest";
import axios, { AxiosHeaders, type AxiosResponse } from "axios";
import { ExternalParserError, OpenAiExtractor } from "./externalParser.js";

const NOW = new Date("2026-10-19T16:00:00Z");
const context = { now: NOW, timeZone: "America/Phoenix" };

function completion(content: string | null): AxiosResponse {
  return {
    data: { choices: [{ message: { content } }] },
    status: 200,
    statusText: "OK",
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

describe("OpenAiExtractor", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requires an API key", () => {
    expect(() => new OpenAiExtractor({})).toThrow(ExternalParserError);
  });

  it("sends the message with the current time and returns the parsed JSON", async () => {
    const post = vi
      .spyOn(axios, "post")
      .mockResolvedValue(completion('{"title":"dentist","date":"2026-10-20","time":"15:00","durationMinutes":30}'));
    const extractor = new OpenAiExtractor({ apiKey: "test-key", model: "test-model", timeoutMs: 1500 });

    const result = await extractor.extract("Book a dentist appointment tomorrow at 3pm", context);

    expect(result).toEqual({ title: "dentist", date: "2026-10-20", time: "15:00", durationMinutes: 30 });
    const [url, body, options] = post.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(body).toMatchObject({ model: "test-model", response_format: { type: "json_object" } });
    expect(JSON.stringify(body)).toContain("The current datetime is 2026-10-19T09:00:00 in the America/Phoenix time zone.");
    expect(options).toMatchObject({ timeout: 1500, headers: { Authorization: "Bearer test-key" } });
  });

  it("rejects an empty reply", async () => {
    vi.spyOn(axios, "post").mockResolvedValue(completion(null));
    const extractor = new OpenAiExtractor({ apiKey: "test-key" });

    await expect(extractor.extract("Book something", context)).rejects.toMatchObject({
      code: "external_parser_empty",
    });
  });

  it("rejects a reply that is not JSON", async () => {
    vi.spyOn(axios, "post").mockResolvedValue(completion("tomorrow at three"));
    const extractor = new OpenAiExtractor({ apiKey: "test-key" });

    await expect(extractor.extract("Book something", context)).rejects.toMatchObject({
      code: "external_parser_malformed",
    });
  });
});
