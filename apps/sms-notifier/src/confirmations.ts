// Optional email follow-up after the SMS batch: contacts with an address get
// the configured success or error text. Mail failures are logged and counted,
// they never change the SMS outcome.
import type { EmailSettings, SendResult } from "@sms-notifier/shared";
import { sendEmail, type MailTransport } from "./adapters/email.js";
import { renderConfirmationEmail } from "./templates/email.js";
import { silentLogger, type Logger } from "./logger.js";

export type ConfirmationTally = {
  emailed: number;
  failed: number;
  skipped: number;
};

export async function sendConfirmations(
  results: readonly SendResult[],
  settings: EmailSettings,
  transport: MailTransport,
  logger: Logger = silentLogger,
): Promise<ConfirmationTally> {
  const tally: ConfirmationTally = { emailed: 0, failed: 0, skipped: 0 };

  for (const result of results) {
    const { email, phoneNumber } = result.contact;
    if (!email) {
      tally.skipped++;
      logger.debug({ to: phoneNumber }, "no email address → skipping confirmation");
      continue;
    }

    try {
      const messageId = await sendEmail(
        transport,
        settings.from,
        { to: email, ...renderConfirmationEmail(result, settings) },
      );
      tally.emailed++;
      logger.info({ email, sms: result.status, messageId }, "confirmation emailed");
    } catch (err) {
      tally.failed++;
      logger.warn({ email, err }, "confirmation email failed");
    }
  }

  return tally;
}
