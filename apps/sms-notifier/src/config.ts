// Runtime environment for the notifier. Operator-facing settings
// (credentials, message text) live in the INI file, see settings.ts.
import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const Env = z.object({
  NODE_ENV: z.string().default("production"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // Vonage (ex-Nexmo) SMS endpoint
  SMS_API_URL: z.string().url().default("https://rest.nexmo.com/sms/json"),
  SMS_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type Env = z.infer<typeof Env>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return Env.parse(source);
}

export const env = readEnv();
