import "dotenv/config";
import { z } from "zod";

const flag = z
  .string()
  .optional()
  .transform((value) => (value ?? "").toLowerCase() === "true");

const EnvSchema = z.object({
  PORT: z.coerce.number().default(3000),
  DB_PATH: z.string().optional(),

  // Wall-clock zone for day boundaries, "today" and recurring start times
  DEFAULT_TIMEZONE: z.string().default("UTC"),

  // Google Calendar
  GOOGLE_CLIENT_ID: z.string().optional(),
  GOOGLE_CLIENT_SECRET: z.string().optional(),
  GOOGLE_REDIRECT_URI: z.string().optional(),

  // Microsoft 365 (Graph)
  MICROSOFT_CLIENT_ID: z.string().optional(),
  MICROSOFT_CLIENT_SECRET: z.string().optional(),
  MICROSOFT_TENANT_ID: z.string().default("common"),

  SERIALIZE_BOOKINGS: flag,
  DEFAULT_RECURRING_SPAN_DAYS: z.coerce.number().int().positive().default(90),
});

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
