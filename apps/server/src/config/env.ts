import "dotenv/config";
import { z } from "zod";

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => (value ?? "").toLowerCase() === "true");

const EnvSchema = z.object({
  PORT: z.coerce.number().default(3000),

  DEFAULT_TIMEZONE: z.string().optional(),

  // Business rules
  BUSINESS_OPEN: z.string().optional(),
  BUSINESS_CLOSE: z.string().optional(),
  BUSINESS_LAST_START: z.string().optional(),
  LUNCH_START: z.string().optional(),
  LUNCH_END: z.string().optional(),
  WORKING_DAYS: z.string().optional(),
  HOLIDAYS: z.string().optional(),
  SLOT_GRANULARITY_MINUTES: z.coerce.number().optional(),
  APPT_DURATION_MINUTES: z.coerce.number().optional(),

  // Optional language-model extraction
  USE_EXTERNAL_PARSER: booleanFlag,
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_PARSER_MODEL: z.string().optional(),
  PARSER_TIMEOUT_MS: z.coerce.number().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
