import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import type { ClockTime } from "./parsedRequest.js";

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);

const WEEKDAYS = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
];

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const MONTH_WORDS = new Set([
  ...MONTHS,
  "jan",
  "feb",
  "mar",
  "apr",
  "jun",
  "jul",
  "aug",
  "sep",
  "sept",
  "oct",
  "nov",
  "dec",
]);

const WEEKDAY_PATTERN = /\b(?:next\s+|this\s+|on\s+)?(sunday|monday|tuesday|wednesday|thursday|friday|saturday)\b/;
const MONTH_DAY_PATTERN =
  /\b(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\.?\s+(\d{1,2})(?:st|nd|rd|th)?\b(?:,?\s+(\d{4})\b)?/;
const FULL_NUMERIC_DATE = /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/;
const SHORT_NUMERIC_DATE = /\b(\d{1,2})\/(\d{1,2})\b(?!\/)/;

const MERIDIAN_TIME = /\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/;
const COLON_TIME = /\b(\d{1,2}):(\d{2})\b/;
const BARE_TIME =
  /^(?:(?:at|how about|let's do|lets do|make it|i'll take|i will take)\s+)?(\d{1,2})(?::(\d{2}))?\s*(am|pm)?(?:\s+(?:please|works|is fine|then))?$/;

const BOOKING_VERB = /\b(?:book|schedule|add|set up|reserve|plan|make|arrange|organi[sz]e|create)\b\s+(.*)$/;
const CHANGE_VERB =
  /\b(?:cancel|remove|delete|call off|reschedule|move|rebook|postpone|push back|push|change|shift)\b\s*(.*)$/;
const APPOINTMENT_NOUN =
  /(?<![a-z0-9])(?:([a-z]+)\s+)?(appointment|meeting|call|visit|consultation|checkup|check-up|session|interview|haircut|review|lesson|class)\b/;

const PHRASE_FILLERS = new Set(["me", "us", "a", "an", "the", "my", "our", "new", "another", "in", "up", "that"]);
const PHRASE_STOPS = new Set([
  "on",
  "at",
  "for",
  "to",
  "from",
  "today",
  "tomorrow",
  "tonight",
  "next",
  "this",
  "by",
  "around",
  "between",
  "please",
  "and",
  "am",
  "pm",
  "noon",
  "instead",
  "back",
  "slot",
]);
const GENERIC_TITLES = new Set(["appointment", "slot", "time", "something", "spot", "one", "it", "booking"]);

export const DEFAULT_TITLE = "appointment";

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/(\d\s*)([ap])\.m\.?/g, "$1$2m")
    .replace(/\s+/g, " ")
    .trim();
}

function cleanForPhrase(text: string) {
  return normalizeText(text)
    .replace(/[^a-z0-9:'/\s-]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function pad(value: number) {
  return String(value).padStart(2, "0");
}

export function referenceDate(now: Date, timeZone: string): string {
  return dayjs(now).tz(timeZone).format("YYYY-MM-DD");
}

export function shiftDate(dateISO: string, days: number): string {
  return dayjs.utc(dateISO).add(days, "day").format("YYYY-MM-DD");
}

export function weekdayOf(dateISO: string): number {
  return dayjs.utc(dateISO).day();
}

function buildDate(year: number, month: number, day: number): string | null {
  const parsed = dayjs.utc(`${year}-${pad(month)}-${pad(day)}`, "YYYY-MM-DD", true);
  return parsed.isValid() ? parsed.format("YYYY-MM-DD") : null;
}

/** Same month/day this year, or next year when that has already passed. */
function rollForward(month: number, day: number, today: string): string | null {
  const year = Number(today.slice(0, 4));
  const candidate = buildDate(year, month, day);
  if (candidate && candidate >= today) return candidate;
  return buildDate(year + 1, month, day);
}

function monthDayOrder(first: number, second: number): [number, number] | null {
  if (first >= 1 && first <= 12) return [first, second];
  if (second >= 1 && second <= 12) return [second, first];
  return null;
}

export function parseDate(text: string, now: Date, timeZone: string): string | null {
  const lower = normalizeText(text);
  const today = referenceDate(now, timeZone);

  if (/\btomorrow\b/.test(lower)) return shiftDate(today, 1);
  if (/\btoday\b/.test(lower)) return today;

  const weekdayMatch = lower.match(WEEKDAY_PATTERN);
  if (weekdayMatch) {
    const target = WEEKDAYS.indexOf(weekdayMatch[1]);
    const ahead = (target - weekdayOf(today) + 7) % 7 || 7;
    return shiftDate(today, ahead);
  }

  const monthMatch = lower.match(MONTH_DAY_PATTERN);
  if (monthMatch) {
    const month = MONTHS.findIndex((name) => name.startsWith(monthMatch[1].slice(0, 3))) + 1;
    const day = Number(monthMatch[2]);
    const resolved = monthMatch[3]
      ? buildDate(Number(monthMatch[3]), month, day)
      : rollForward(month, day, today);
    if (resolved) return resolved;
  }

  // full form first so "12/31/2026" is never cut down to "12/31"
  const fullMatch = lower.match(FULL_NUMERIC_DATE);
  if (fullMatch) {
    const order = monthDayOrder(Number(fullMatch[1]), Number(fullMatch[2]));
    const resolved = order ? buildDate(Number(fullMatch[3]), order[0], order[1]) : null;
    if (resolved) return resolved;
  }

  const shortMatch = lower.match(SHORT_NUMERIC_DATE);
  if (shortMatch) {
    const order = monthDayOrder(Number(shortMatch[1]), Number(shortMatch[2]));
    const resolved = order ? rollForward(order[0], order[1], today) : null;
    if (resolved) return resolved;
  }

  return null;
}

function toClock(hour: number, minute: number, meridian?: string): ClockTime | null {
  if (minute > 59) return null;
  if (meridian) {
    if (hour < 1 || hour > 12) return null;
    if (meridian === "pm" && hour < 12) hour += 12;
    if (meridian === "am" && hour === 12) hour = 0;
    return { hour, minute };
  }
  if (hour > 23) return null;
  // "2:00" without a marker means the afternoon during business hours
  if (hour >= 1 && hour <= 7) hour += 12;
  return { hour, minute };
}

/**
 * Only tokens with an am/pm marker or a colon count as times, so the day in
 * "July 4th" or "3/15" is never read as an hour.
 */
export function parseTime(text: string): ClockTime | null {
  const lower = normalizeText(text);
  const meridian = lower.match(MERIDIAN_TIME);
  if (meridian) {
    return toClock(Number(meridian[1]), Number(meridian[2] ?? 0), meridian[3]);
  }
  if (/\bnoon\b/.test(lower)) return { hour: 12, minute: 0 };
  const colon = lower.match(COLON_TIME);
  if (colon) {
    return toClock(Number(colon[1]), Number(colon[2]));
  }
  return null;
}

/** A reply that is nothing but a time, e.g. "2pm", "at 10:30", "3". */
export function parseBareTime(text: string): ClockTime | null {
  const lower = normalizeText(text).replace(/[.!?,]+$/, "").trim();
  if (/^(?:at\s+)?noon$/.test(lower)) return { hour: 12, minute: 0 };
  const match = lower.match(BARE_TIME);
  if (!match) return null;
  return toClock(Number(match[1]), Number(match[2] ?? 0), match[3]);
}

export function parseDuration(text: string): number | null {
  const lower = normalizeText(text);
  if (/\bhalf an? hour\b|\bhalf hour\b/.test(lower)) return 30;

  let total = 0;
  let found = false;
  const hours = lower.match(/\b(\d+(?:\.\d+)?)\s*(?:hours?|hrs?)\b/);
  if (hours) {
    total += Number(hours[1]) * 60;
    found = true;
  } else if (/\b(?:an|one)\s+hour\b/.test(lower)) {
    total += 60;
    found = true;
  }
  const minutes = lower.match(/\b(\d+)\s*(?:minutes?|mins?)\b/);
  if (minutes) {
    total += Number(minutes[1]);
    found = true;
  }

  const rounded = Math.round(total);
  return found && rounded > 0 ? rounded : null;
}

function isStopWord(word: string) {
  return /^\d/.test(word) || PHRASE_STOPS.has(word) || WEEKDAYS.includes(word) || MONTH_WORDS.has(word);
}

function collectPhrase(rest: string, maxWords = 5): string {
  const picked: string[] = [];
  for (const word of rest.split(" ")) {
    if (!word) continue;
    if (!picked.length && PHRASE_FILLERS.has(word)) continue;
    if (isStopWord(word)) break;
    picked.push(word);
    if (picked.length >= maxWords) break;
  }
  return picked.join(" ");
}

function nounPhrase(cleaned: string): string {
  const match = cleaned.match(APPOINTMENT_NOUN);
  if (!match) return "";
  const qualifier = match[1];
  if (qualifier && !PHRASE_FILLERS.has(qualifier) && !isStopWord(qualifier) && qualifier !== "of") {
    return `${qualifier} ${match[2]}`;
  }
  return match[2];
}

function forPhrase(cleaned: string): string {
  for (const match of cleaned.matchAll(/\bfor\s+/g)) {
    const phrase = collectPhrase(cleaned.slice((match.index ?? 0) + match[0].length));
    if (phrase) return phrase;
  }
  return "";
}

export function parseTitle(text: string): string {
  const cleaned = cleanForPhrase(text);
  const verbMatch = cleaned.match(BOOKING_VERB);
  const verbPhrase = verbMatch ? collectPhrase(verbMatch[1]) : "";
  if (verbPhrase && !GENERIC_TITLES.has(verbPhrase)) return verbPhrase;

  const noun = nounPhrase(cleaned);
  if (noun && noun.includes(" ")) return noun;

  const described = forPhrase(cleaned);
  if (described && !GENERIC_TITLES.has(described)) return described;

  if (noun && !GENERIC_TITLES.has(noun)) return noun;
  return DEFAULT_TITLE;
}

/** The words naming an existing appointment in a cancel or reschedule request. */
export function parseReferencePhrase(text: string): string | undefined {
  const cleaned = cleanForPhrase(text);
  const verbMatch = cleaned.match(CHANGE_VERB);
  const phrase = verbMatch ? collectPhrase(verbMatch[1]) : "";
  if (phrase) return phrase;
  return nounPhrase(cleaned) || undefined;
}

/**
 * Splits "move my meeting tomorrow to friday at 3pm" into the part naming the
 * existing appointment and the part giving its new time.
 */
export function splitRescheduleTarget(text: string): { source: string; target: string } | null {
  const lower = normalizeText(text);
  const match = lower.match(/^(.*?)\s+to\s+(.+)$/);
  if (!match) return null;
  return { source: match[1], target: match[2] };
}
