import { z } from "zod";
import { InvalidConfigError } from "./errors";

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

// `KEY=` in .env means "not set".
function blankAsUnset(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  DATABASE_URL: z.preprocess(blankAsUnset, z.string().trim().min(1).default("file:budget.db")),
  DATABASE_AUTH_TOKEN: optionalText,
  // Funding periods are calendar months in this zone.
  BUDGET_TIME_ZONE: z.preprocess(
    blankAsUnset,
    z.string().trim().default("UTC").refine(isTimeZone, { message: "must be an IANA time zone" })
  ),
  EMAIL_TO: optionalText,
  EMAIL_FROM: optionalText,
  SMTP_HOST: optionalText,
  SMTP_PORT: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(587)),
  SMTP_USER: optionalText,
  SMTP_PASS: optionalText,
});

export interface Config {
  database: { url: string; authToken?: string };
  funding: { timeZone: string };
  email: { to?: string; from?: string };
  smtp: { host?: string; port: number; user?: string; pass?: string };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidConfigError(result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const e = result.data;
  return {
    database: { url: e.DATABASE_URL, authToken: e.DATABASE_AUTH_TOKEN },
    funding: { timeZone: e.BUDGET_TIME_ZONE },
    email: { to: e.EMAIL_TO, from: e.EMAIL_FROM },
    smtp: { host: e.SMTP_HOST, port: e.SMTP_PORT, user: e.SMTP_USER, pass: e.SMTP_PASS },
  };
}
