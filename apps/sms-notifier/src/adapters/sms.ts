// Vonage (ex-Nexmo) SMS API client. One HTTP call per message, no retries:
// whatever the provider says on the first attempt is final.
import { z } from "zod";
import { env } from "../config.js";

export type OutboundSms = { from: string; to: string; text: string };
export type SmsReceipt = { messageId: string };

export interface SmsClient {
  send(sms: OutboundSms): Promise<SmsReceipt>;
}

/** The provider answered but refused the message (status != "0"). */
export class SmsProviderError extends Error {
  name = "SmsProviderError";

  constructor(
    readonly status: string,
    message: string,
  ) {
    super(message);
  }
}

export class SmsTimeoutError extends Error {
  name = "SmsTimeoutError";

  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
  }
}

// https://developer.vonage.com/en/api/sms: every part of a long message
// comes back as its own entry in `messages`.
const VonageResponse = z.object({
  "message-count": z.coerce.number().optional(),
  messages: z
    .array(
      z.object({
        to: z.string().optional(),
        "message-id": z.string().optional(),
        status: z.coerce.string(),
        "error-text": z.string().optional(),
      }),
    )
    .min(1),
});

// GSM 03.38 default alphabet plus its extension table. Anything else needs
// the UCS-2 ("unicode") encoding, which halves the characters per part.
const GSM7 = new Set(
  "@£$¥èéùìòÇ\nØø\rÅåΔ_ΦΓΛΩΠΨΣΘΞÆæßÉ !\"#¤%&'()*+,-./0123456789:;<=>?" +
    "¡ABCDEFGHIJKLMNOPQRSTUVWXYZÄÖÑÜ§¿abcdefghijklmnopqrstuvwxyzäöñüà" +
    "\f^{}\\[~]|€",
);

export function isGsm7(text: string) {
  for (const ch of text) if (!GSM7.has(ch)) return false;
  return true;
}

export type VonageClientOptions = {
  apiKey: string;
  apiSecret: string;
  url?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
};

export class VonageSmsClient implements SmsClient {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: VonageClientOptions) {
    this.url = options.url ?? env.SMS_API_URL;
    this.timeoutMs = options.timeoutMs ?? env.SMS_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async send(sms: OutboundSms): Promise<SmsReceipt> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify({
          api_key: this.options.apiKey,
          api_secret: this.options.apiSecret,
          from: sms.from,
          to: sms.to,
          text: sms.text,
          ...(isGsm7(sms.text) ? {} : { type: "unicode" }),
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === "TimeoutError") {
        throw new SmsTimeoutError(this.timeoutMs);
      }
      throw err;
    }

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new SmsProviderError(
        `http_${res.status}`,
        body.trim() || res.statusText || "request rejected",
      );
    }

    const parsed = VonageResponse.safeParse(await res.json().catch(() => null));
    if (!parsed.success) {
      throw new SmsProviderError("bad_response", "unexpected response body");
    }

    const rejected = parsed.data.messages.find((m) => m.status !== "0");
    if (rejected) {
      throw new SmsProviderError(
        rejected.status,
        rejected["error-text"] ?? "message rejected",
      );
    }

    return { messageId: parsed.data.messages[0]["message-id"] ?? "vonage-no-id" };
  }
}
