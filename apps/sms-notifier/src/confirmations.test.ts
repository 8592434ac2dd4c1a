import assert from "node:assert/strict";
import test from "node:test";

import type { SendMailOptions } from "nodemailer";
import type { EmailSettings, SendResult } from "@sms-notifier/shared";
import type { MailTransport } from "./adapters/email.js";
import { sendConfirmations } from "./confirmations.js";
import { EMAIL_DEFAULTS } from "./settings.js";

class FakeTransport implements MailTransport {
  readonly sent: SendMailOptions[] = [];

  constructor(private readonly bounce = new Set<string>()) {}

  async sendMail(options: SendMailOptions) {
    if (typeof options.to === "string" && this.bounce.has(options.to)) {
      throw new Error("550 mailbox unavailable");
    }
    this.sent.push(options);
    return { messageId: `<${this.sent.length}@mail.test>` };
  }
}

const settings: EmailSettings = {
  from: "ops@example.com",
  password: "test-password",
  ...EMAIL_DEFAULTS,
};

const results: SendResult[] = [
  {
    contact: { phoneNumber: "+15550000001", name: "Ann", email: "ann@example.com", row: 2 },
    status: "sent",
    detail: "msg-1",
  },
  {
    contact: { phoneNumber: "+15550000002", row: 3 },
    status: "failed",
    detail: "provider status 3: Invalid to",
  },
  {
    contact: { phoneNumber: "+15550000003", email: "cy@example.com", row: 4 },
    status: "failed",
    detail: "provider status 3: Invalid to",
  },
];

test("contacts with an email get the text matching their SMS outcome", async () => {
  const transport = new FakeTransport();

  const tally = await sendConfirmations(results, settings, transport);

  assert.deepEqual(tally, { emailed: 2, failed: 0, skipped: 1 });
  assert.deepEqual(transport.sent[0], {
    from: "ops@example.com",
    to: "ann@example.com",
    subject: "Email notification",
    text: "Hello Ann,\n\nWe have sent you an SMS, please check your phone!",
    html: "<p>Hello Ann,</p><p>&nbsp;</p><p>We have sent you an SMS, please check your phone!</p>",
  });
  assert.equal(transport.sent[1].to, "cy@example.com");
  assert.equal(
    transport.sent[1].text,
    "Hello,\n\nWe could not reach you by SMS, please get in touch with us!",
  );
});

test("a bounced email is counted and the rest still go out", async () => {
  const transport = new FakeTransport(new Set(["ann@example.com"]));

  const tally = await sendConfirmations(results, settings, transport);

  assert.deepEqual(tally, { emailed: 1, failed: 1, skipped: 1 });
  assert.deepEqual(
    transport.sent.map((m) => m.to),
    ["cy@example.com"],
  );
});
