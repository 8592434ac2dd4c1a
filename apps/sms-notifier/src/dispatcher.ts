// Dispatcher: one send attempt per contact, strictly in order. A failure is
// recorded on that contact's result and the batch moves on.
import type { Contact, SendResult } from "@sms-notifier/shared";
import {
  SmsProviderError,
  SmsTimeoutError,
  type SmsClient,
} from "./adapters/sms.js";
import { personalize, type RenderedMessage } from "./templates/sms.js";
import { silentLogger, type Logger } from "./logger.js";

export type DispatchOptions = {
  logger?: Logger;
  /** Once aborted, contacts not yet attempted are left out of the results. */
  signal?: AbortSignal;
};

/** Human-readable reason for a failed send. */
export function describeSendError(err: unknown): string {
  if (err instanceof SmsProviderError) {
    return `provider status ${err.status}: ${err.message}`;
  }
  if (err instanceof SmsTimeoutError) return err.message;

  if (err instanceof Error) {
    // undici reports connection problems as TypeError("fetch failed", { cause })
    const cause: unknown = err.cause;
    if (err.name === "TypeError" && cause instanceof Error) {
      return `network error: ${cause.message}`;
    }
    if (/ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN/.test(err.message)) {
      return `network error: ${err.message}`;
    }
    return err.message || err.name;
  }
  return String(err);
}

export async function dispatch(
  message: RenderedMessage,
  contacts: readonly Contact[],
  client: SmsClient,
  { logger = silentLogger, signal }: DispatchOptions = {},
): Promise<SendResult[]> {
  const results: SendResult[] = [];

  for (const contact of contacts) {
    if (signal?.aborted) {
      logger.warn(
        { remaining: contacts.length - results.length },
        "interrupted → remaining contacts not attempted",
      );
      break;
    }

    const to = contact.phoneNumber;
    try {
      const { messageId } = await client.send({
        from: message.sender,
        to,
        text: personalize(message, contact),
      });
      results.push({ contact, status: "sent", detail: messageId });
      logger.info({ to, row: contact.row, messageId }, "sent");
    } catch (err) {
      const detail = describeSendError(err);
      results.push({ contact, status: "failed", detail });
      logger.warn({ to, row: contact.row, detail }, "send failed");
    }
  }

  return results;
}
