import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import { z } from "zod";
import type { AppointmentReference } from "../calendar/types.js";
import {
  normalizeText,
  parseBareTime,
  parseDate,
  parseDuration,
  parseReferencePhrase,
  parseTime,
  parseTitle,
  referenceDate,
  splitRescheduleTarget,
} from "./bookingParser.js";
import type { StructuredExtractor } from "./externalParser.js";
import type { ParsedRequest, PendingKind } from "./parsedRequest.js";

dayjs.extend(utc);
dayjs.extend(customParseFormat);

const GREETINGS = new Set([
  "hi",
  "hello",
  "hey",
  "hiya",
  "howdy",
  "greetings",
  "yo",
  "sup",
  "hi there",
  "hello there",
  "hey there",
  "good morning",
  "good afternoon",
  "good evening",
  "good day",
  "morning",
  "afternoon",
  "what's up",
]);

const YES_WORDS = new Set([
  "yes",
  "y",
  "yeah",
  "yep",
  "yup",
  "sure",
  "ok",
  "okay",
  "confirm",
  "sounds good",
  "please do",
  "yes please",
  "that works",
]);

const NO_WORDS = new Set([
  "no",
  "n",
  "nope",
  "nah",
  "no thanks",
  "no thank you",
  "cancel it",
  "never mind",
  "nevermind",
  "don't",
]);

const SMALLTALK_PATTERN = /\b(how are you|how're you|how r u|how are u|how do you do|how's it going)\b/;
const OUT_OF_SCOPE_PATTERN =
  /\b(weather|jokes?|news|sports?|recipes?|movies?|music|games?|stocks?|what time is it|who are you|what can you do)\b/;
const CANCEL_PATTERN = /\b(cancel|remove|delete|call off)\b/;
const RESCHEDULE_PATTERN = /\b(reschedule|move|rebook|postpone|push|change|shift)\b/;
const LIST_VERB = /\b(list|show|what|what's|view|see|check)\b/;
const LIST_NOUN = /\b(appointments?|schedule|calendar|booked|have|meetings)\b/;
const BOOKING_VOCABULARY =
  /\b(book|schedule|appointment|meeting|slot|reserve|set up|plan|arrange|add|availability|available|free|open|visit|call)\b/;

export interface ParseContext {
  now: Date;
  timeZone: string;
  pending: PendingKind;
}

function stripPunctuation(lower: string) {
  return lower.replace(/[.!?,]+/g, "").trim();
}

function isGreeting(lower: string) {
  const bare = stripPunctuation(lower);
  if (GREETINGS.has(bare)) return true;
  return (
    lower.length <= 25 &&
    /[!?]$/.test(lower) &&
    /\b(hi|hello|hey)\b/.test(lower) &&
    !BOOKING_VOCABULARY.test(lower)
  );
}

function buildReference(text: string, context: ParseContext): AppointmentReference {
  const date = parseDate(text, context.now, context.timeZone);
  return {
    phrase: parseReferencePhrase(text),
    ...(date ? { date } : {}),
  };
}

function parseCancel(text: string, context: ParseContext): ParsedRequest {
  return { intent: "cancel", reference: buildReference(text, context), source: "rules" };
}

function parseReschedule(text: string, context: ParseContext): ParsedRequest {
  const split = splitRescheduleTarget(text);
  const source = split?.source ?? text;
  const target = split?.target ?? text;
  const reference: AppointmentReference = split
    ? buildReference(source, context)
    : { phrase: parseReferencePhrase(text) };
  const date = parseDate(target, context.now, context.timeZone);
  const time = parseTime(target);
  const durationMinutes = parseDuration(target);
  return {
    intent: "reschedule",
    reference,
    ...(date ? { date } : {}),
    ...(time ? { time } : {}),
    ...(durationMinutes ? { durationMinutes } : {}),
    source: "rules",
  };
}

function parseBooking(text: string, lower: string, context: ParseContext): ParsedRequest {
  const date = parseDate(text, context.now, context.timeZone);
  const time = parseTime(text);
  const durationMinutes = parseDuration(text);

  if (!date && !time) {
    if (BOOKING_VOCABULARY.test(lower)) return { intent: "unknown", source: "rules" };
    return { intent: "out_of_scope", source: "rules" };
  }

  const fields = {
    title: parseTitle(text),
    ...(durationMinutes ? { durationMinutes } : {}),
    source: "rules" as const,
  };
  if (!time) {
    return { intent: "date_only_create", date: date ?? undefined, ...fields };
  }
  return {
    intent: "create",
    date: date ?? referenceDate(context.now, context.timeZone),
    time,
    ...fields,
  };
}

/**
 * Rule-based parse of one utterance. Never throws; anything it cannot place
 * comes back as `unknown` (or `out_of_scope` when nothing about it looks like
 * scheduling).
 */
export function parseUtterance(text: string, context: ParseContext): ParsedRequest {
  const lower = normalizeText(text);
  if (!lower) return { intent: "unknown", source: "rules" };
  const bare = stripPunctuation(lower);

  if (context.pending !== "none") {
    if (YES_WORDS.has(bare)) return { intent: "confirm_yes", source: "rules" };
    if (NO_WORDS.has(bare)) return { intent: "confirm_no", source: "rules" };
    if (context.pending === "slot_choice") {
      const time = parseBareTime(lower);
      if (time) return { intent: "slot_choice", time, source: "rules" };
    }
  }

  if (SMALLTALK_PATTERN.test(lower) && !BOOKING_VOCABULARY.test(lower)) {
    return { intent: "smalltalk", source: "rules" };
  }
  if (isGreeting(lower)) return { intent: "greeting", source: "rules" };
  if (CANCEL_PATTERN.test(lower)) return parseCancel(text, context);
  if (RESCHEDULE_PATTERN.test(lower)) return parseReschedule(text, context);
  if (YES_WORDS.has(bare)) return { intent: "confirm_yes", source: "rules" };
  if (NO_WORDS.has(bare)) return { intent: "confirm_no", source: "rules" };
  if (OUT_OF_SCOPE_PATTERN.test(lower)) return { intent: "out_of_scope", source: "rules" };
  if (LIST_VERB.test(lower) && LIST_NOUN.test(lower)) return { intent: "list", source: "rules" };
  return parseBooking(text, lower, context);
}

const ExtractionSchema = z.object({
  title: z.string().trim().min(1),
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .refine((value) => dayjs.utc(value, "YYYY-MM-DD", true).isValid(), "not a calendar date"),
  time: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/)
    .nullable(),
  durationMinutes: z.number().int().positive(),
});

export type Extraction = z.infer<typeof ExtractionSchema>;

export interface UtteranceParserOptions {
  timeZone: string;
  extractor?: StructuredExtractor;
  timeoutMs?: number;
}

export class ExtractionTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`External parser did not answer within ${timeoutMs}ms`);
    this.name = "ExtractionTimeoutError";
  }
}

export class UtteranceParser {
  private timeZone: string;
  private extractor?: StructuredExtractor;
  private timeoutMs: number;

  constructor(options: UtteranceParserOptions) {
    this.timeZone = options.timeZone;
    this.extractor = options.extractor;
    this.timeoutMs = options.timeoutMs ?? 4000;
  }

  parse(text: string, now: Date, pending: PendingKind = "none"): ParsedRequest {
    return parseUtterance(text, { now, timeZone: this.timeZone, pending });
  }

  /**
   * Booking-shaped requests are offered to the external extractor first; its
   * answer replaces the rule-based fields only when it is complete and well
   * typed. Every failure falls back to the rule-based result.
   */
  async resolve(text: string, now: Date, pending: PendingKind = "none"): Promise<ParsedRequest> {
    const parsed = this.parse(text, now, pending);
    if (!this.extractor || (parsed.intent !== "create" && parsed.intent !== "date_only_create")) {
      return parsed;
    }

    try {
      const raw = await this.extractWithTimeout(text, now);
      const extraction = ExtractionSchema.safeParse(raw);
      if (!extraction.success) {
        console.log("🧠 external parse rejected, using rules", {
          issues: extraction.error.issues.map((issue) => issue.path.join(".") || issue.message),
        });
        return parsed;
      }
      return fromExtraction(extraction.data);
    } catch (error) {
      console.log("🧠 external parse failed, using rules", {
        error: error instanceof Error ? error.message : String(error),
      });
      return parsed;
    }
  }

  private async extractWithTimeout(text: string, now: Date): Promise<unknown> {
    const extractor = this.extractor;
    if (!extractor) return null;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ExtractionTimeoutError(this.timeoutMs));
      }, this.timeoutMs);
    });
    try {
      return await Promise.race([
        extractor.extract(text, { now, timeZone: this.timeZone, signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function fromExtraction(extraction: Extraction): ParsedRequest {
  const base = {
    date: extraction.date,
    title: extraction.title,
    durationMinutes: extraction.durationMinutes,
    source: "external" as const,
  };
  if (!extraction.time) {
    return { intent: "date_only_create", ...base };
  }
  const [hour, minute] = extraction.time.split(":").map(Number);
  return { intent: "create", time: { hour, minute }, ...base };
}
