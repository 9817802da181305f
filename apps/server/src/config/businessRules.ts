import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import { z } from "zod";
import type { Env } from "./env.js";

/** Minutes after local midnight. */
export type TimeOfDay = number;

export interface BusinessRules {
  timeZone: string;
  /** 0 = Sunday … 6 = Saturday */
  workingDays: readonly number[];
  open: TimeOfDay;
  close: TimeOfDay;
  lastStart: TimeOfDay;
  lunch: { start: TimeOfDay; end: TimeOfDay };
  /** `MM-DD` recurs every year, `YYYY-MM-DD` applies once. */
  holidays: readonly string[];
  granularityMinutes: number;
  defaultDurationMinutes: number;
}

export class SchedulerConfigError extends Error {
  constructor(
    public code: "invalid_business_rules",
    message: string
  ) {
    super(message);
    this.name = "SchedulerConfigError";
  }
}

export const DEFAULT_HOLIDAYS = [
  "01-01",
  "05-27",
  "07-04",
  "09-02",
  "11-27",
  "11-28",
  "12-25",
];

dayjs.extend(utc);
dayjs.extend(timezone);

function isKnownTimeZone(value: string) {
  try {
    dayjs().tz(value);
    return true;
  } catch {
    return false;
  }
}

const timeOfDaySchema = z
  .string()
  .regex(/^\d{1,2}:\d{2}$/, "expected HH:mm")
  .transform((value, ctx) => {
    const [hour, minute] = value.split(":").map(Number);
    if (hour > 23 || minute > 59) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid time ${value}` });
      return z.NEVER;
    }
    return hour * 60 + minute;
  });

const holidaySchema = z.string().regex(/^(\d{4}-)?\d{2}-\d{2}$/, "expected MM-DD or YYYY-MM-DD");

const BusinessRulesSchema = z
  .object({
    timeZone: z.string().min(1).refine(isKnownTimeZone, (value) => ({ message: `unknown time zone ${value}` })),
    workingDays: z.array(z.number().int().min(0).max(6)).min(1),
    open: timeOfDaySchema,
    close: timeOfDaySchema,
    lastStart: timeOfDaySchema,
    lunch: z.object({ start: timeOfDaySchema, end: timeOfDaySchema }),
    holidays: z.array(holidaySchema),
    granularityMinutes: z.number().int().positive(),
    defaultDurationMinutes: z.number().int().positive(),
  })
  .superRefine((rules, ctx) => {
    if (!(rules.open < rules.lunch.start && rules.lunch.start < rules.lunch.end && rules.lunch.end < rules.close)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "open < lunch.start < lunch.end < close must hold",
      });
    }
    if (rules.lastStart < rules.open || rules.lastStart > rules.close) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "lastStart must fall between open and close",
      });
    }
  });

export type BusinessRulesInput = z.input<typeof BusinessRulesSchema>;

export const DEFAULT_BUSINESS_RULES_INPUT: BusinessRulesInput = {
  timeZone: "America/Phoenix",
  workingDays: [1, 2, 3, 4, 5],
  open: "08:00",
  close: "17:00",
  lastStart: "16:30",
  lunch: { start: "13:00", end: "14:00" },
  holidays: DEFAULT_HOLIDAYS,
  granularityMinutes: 30,
  defaultDurationMinutes: 30,
};

export function createBusinessRules(overrides: Partial<BusinessRulesInput> = {}): BusinessRules {
  const parsed = BusinessRulesSchema.safeParse({ ...DEFAULT_BUSINESS_RULES_INPUT, ...overrides });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new SchedulerConfigError("invalid_business_rules", `Invalid business rules: ${details}`);
  }
  return Object.freeze({
    ...parsed.data,
    workingDays: Object.freeze([...parsed.data.workingDays]),
    lunch: Object.freeze({ ...parsed.data.lunch }),
    holidays: Object.freeze([...parsed.data.holidays]),
  });
}

function splitList(value: string | undefined) {
  return value
    ?.split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function loadBusinessRules(source: Env): BusinessRules {
  const overrides: Partial<BusinessRulesInput> = {};
  if (source.DEFAULT_TIMEZONE) overrides.timeZone = source.DEFAULT_TIMEZONE;
  if (source.BUSINESS_OPEN) overrides.open = source.BUSINESS_OPEN;
  if (source.BUSINESS_CLOSE) overrides.close = source.BUSINESS_CLOSE;
  if (source.BUSINESS_LAST_START) overrides.lastStart = source.BUSINESS_LAST_START;
  if (source.LUNCH_START || source.LUNCH_END) {
    overrides.lunch = {
      start: source.LUNCH_START ?? "13:00",
      end: source.LUNCH_END ?? "14:00",
    };
  }
  const workingDays = splitList(source.WORKING_DAYS);
  if (workingDays?.length) overrides.workingDays = workingDays.map(Number);
  const holidays = splitList(source.HOLIDAYS);
  if (holidays) overrides.holidays = holidays;
  if (source.SLOT_GRANULARITY_MINUTES) overrides.granularityMinutes = source.SLOT_GRANULARITY_MINUTES;
  if (source.APPT_DURATION_MINUTES) overrides.defaultDurationMinutes = source.APPT_DURATION_MINUTES;
  return createBusinessRules(overrides);
}

export function formatTimeOfDay(minutes: TimeOfDay): string {
  const hour = Math.floor(minutes / 60);
  const minute = minutes % 60;
  return `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;
}

export function formatTimeOfDay12h(minutes: TimeOfDay): string {
  const hour = Math.floor(minutes / 60);
  const minute = minutes % 60;
  const suffix = hour >= 12 ? "PM" : "AM";
  const displayHour = hour % 12 === 0 ? 12 : hour % 12;
  return `${displayHour}:${String(minute).padStart(2, "0")} ${suffix}`;
}
