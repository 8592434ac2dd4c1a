// Operator settings: the INI file holding Vonage credentials, the SMS text
// and (optionally) the SMTP account used for confirmation emails.
//
//   [NEXMO]            [SMS]                 [EMAIL]      (optional)
//   API_KEY=...        TITLE=... (optional)  SENDER=...   SUBJECT=...
//   API_SECRET=...     BODY=...              PASSWORD=... SUCCESS=...
//                      SENDER=...            SMTP=...     ERROR=...
//                      DESTINATION=...       PORT=...
import { readFile } from "node:fs/promises";
import ini from "ini";
import { z } from "zod";
import {
  ConfigError,
  type EmailSettings,
  type NotifierConfig,
} from "@sms-notifier/shared";

export const EMAIL_DEFAULTS = {
  smtpHost: "smtp.office365.com",
  smtpPort: 587,
  subject: "Email notification",
  successBody: "We have sent you an SMS, please check your phone!",
  errorBody: "We could not reach you by SMS, please get in touch with us!",
} as const;

const blankToUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

/**
 * Values are taken verbatim after the first "=": no inline comments, no
 * true/false/null literals. Each one is handed to `ini` as a JSON string so
 * "BODY=Sale; 50% off" keeps its text. Whole-line comments and sections are
 * left to `ini`.
 */
export function quoteValues(text: string) {
  return text
    .split(/\r?\n/)
    .map((line) => {
      const trimmed = line.trim();
      if (trimmed === "" || /^[;#[]/.test(trimmed)) return line;
      const eq = line.indexOf("=");
      if (eq === -1) return line;
      return `${line.slice(0, eq)}=${JSON.stringify(line.slice(eq + 1).trim())}`;
    })
    .join("\n");
}

/** `ini` still turns a quoted "true"/"false"/"null" into a literal. */
const asText = (v: unknown) =>
  typeof v === "boolean" || v === null ? String(v) : v;

const required = z.preprocess(
  (v) => blankToUndefined(asText(v)),
  z
    .string({ required_error: "is missing", invalid_type_error: "must be text" })
    .trim(),
);

const optional = z.preprocess(
  (v) => blankToUndefined(asText(v)),
  z.string({ invalid_type_error: "must be text" }).trim().optional(),
);

/** A missing section is validated as empty so every absent key gets reported. */
const section = <T extends z.ZodRawShape>(shape: T) =>
  z.preprocess((v) => v ?? {}, z.object(shape));

const Settings = z.object({
  NEXMO: section({
    API_KEY: required,
    API_SECRET: required,
  }),
  SMS: section({
    TITLE: optional,
    BODY: required,
    SENDER: required,
    DESTINATION: optional,
  }),
  EMAIL: z
    .object({
      SENDER: required,
      PASSWORD: required,
      SMTP: optional,
      PORT: optional.refine((v) => v === undefined || /^[1-9]\d*$/.test(v), {
        message: "must be a positive integer",
      }),
      SUBJECT: optional,
      SUCCESS: optional,
      ERROR: optional,
    })
    .optional(),
});

type Settings = z.infer<typeof Settings>;

/** configparser-style: keys are case-insensitive, sections are not. */
function upperCaseKeys(parsed: Record<string, unknown>) {
  const out: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (value && typeof value === "object" && !Array.isArray(value)) {
      out[name] = Object.fromEntries(
        Object.entries(value).map(([k, v]) => [k.toUpperCase(), v]),
      );
    } else {
      out[name] = value;
    }
  }
  return out;
}

function toEmailSettings(
  email: NonNullable<Settings["EMAIL"]>,
): EmailSettings {
  return Object.freeze({
    from: email.SENDER,
    password: email.PASSWORD,
    smtpHost: email.SMTP ?? EMAIL_DEFAULTS.smtpHost,
    smtpPort:
      email.PORT === undefined ? EMAIL_DEFAULTS.smtpPort : Number(email.PORT),
    subject: email.SUBJECT ?? EMAIL_DEFAULTS.subject,
    successBody: email.SUCCESS ?? EMAIL_DEFAULTS.successBody,
    errorBody: email.ERROR ?? EMAIL_DEFAULTS.errorBody,
  });
}

export function parseSettings(text: string, source = "configuration") {
  const result = Settings.safeParse(upperCaseKeys(ini.parse(quoteValues(text))));
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".")} ${issue.message}`,
    );
    throw new ConfigError(`invalid ${source}: ${problems.join("; ")}`);
  }

  const { NEXMO, SMS, EMAIL } = result.data;
  const config: NotifierConfig = {
    apiKey: NEXMO.API_KEY,
    apiSecret: NEXMO.API_SECRET,
    body: SMS.BODY,
    sender: SMS.SENDER,
  };
  if (SMS.TITLE !== undefined) config.title = SMS.TITLE;
  if (SMS.DESTINATION !== undefined) config.destination = SMS.DESTINATION;
  if (EMAIL) config.email = toEmailSettings(EMAIL);

  return Object.freeze(config);
}

export async function loadSettings(path: string): Promise<NotifierConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read configuration ${path}: ${reason}`, {
      cause: err,
    });
  }
  return parseSettings(text, `configuration ${path}`);
}
