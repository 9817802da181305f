import express from "express";
import { loadBusinessRules } from "./config/businessRules.js";
import type { Env } from "./config/env.js";
import { healthRouter } from "./routes/health.js";
import { createSessionsRouter } from "./routes/sessions.js";
import { OpenAiExtractor, type StructuredExtractor } from "./services/booking/externalParser.js";
import { UtteranceParser } from "./services/booking/utteranceParser.js";
import { SessionRegistry } from "./services/conversation/sessionRegistry.js";

export interface SchedulingServiceOptions {
  clock?: () => Date;
  extractor?: StructuredExtractor;
}

function createExtractor(source: Env): StructuredExtractor | undefined {
  if (!source.USE_EXTERNAL_PARSER) return undefined;
  if (!source.OPENAI_API_KEY) {
    console.log("🧠 USE_EXTERNAL_PARSER is set but OPENAI_API_KEY is missing, using rules only");
    return undefined;
  }
  return new OpenAiExtractor({
    apiKey: source.OPENAI_API_KEY,
    model: source.OPENAI_PARSER_MODEL,
    timeoutMs: source.PARSER_TIMEOUT_MS,
  });
}

export function createSchedulingService(source: Env, options: SchedulingServiceOptions = {}) {
  const rules = loadBusinessRules(source);
  const parser = new UtteranceParser({
    timeZone: rules.timeZone,
    extractor: options.extractor ?? createExtractor(source),
    timeoutMs: source.PARSER_TIMEOUT_MS,
  });
  return new SessionRegistry({ rules, parser, clock: options.clock });
}

export function createApp(registry: SessionRegistry) {
  const app = express();

  app.use(express.json());

  app.get("/", (_req, res) => res.status(200).send("OK"));

  app.use(healthRouter);
  app.use(createSessionsRouter(registry));

  return app;
}
