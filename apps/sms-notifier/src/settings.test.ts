import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test, { after } from "node:test";

import { ConfigError } from "@sms-notifier/shared";
import {
  EMAIL_DEFAULTS,
  loadSettings,
  parseSettings,
  quoteValues,
} from "./settings.js";

const ini = (...lines: string[]) => lines.join("\n");

const NEXMO = ["[NEXMO]", "API_KEY=test-key", "API_SECRET=test-secret"];
const SMS = ["[SMS]", "TITLE=Launch", "BODY=Doors open at 9", "SENDER=Acme"];

const dir = await mkdtemp(path.join(os.tmpdir(), "sms-notifier-settings-"));
after(() => rm(dir, { recursive: true, force: true }));

test("parseSettings reads credentials and message fields", () => {
  const config = parseSettings(ini(...NEXMO, "", ...SMS));

  assert.deepEqual(config, {
    apiKey: "test-key",
    apiSecret: "test-secret",
    title: "Launch",
    body: "Doors open at 9",
    sender: "Acme",
  });
  assert.ok(Object.isFrozen(config));
});

test("TITLE and DESTINATION are optional", () => {
  const config = parseSettings(
    ini(...NEXMO, "[SMS]", "BODY=Doors open at 9", "SENDER=Acme"),
  );

  assert.equal(config.title, undefined);
  assert.equal(config.destination, undefined);
  assert.equal(config.email, undefined);
});

test("keys are case-insensitive and values are trimmed", () => {
  const config = parseSettings(
    ini(
      "[NEXMO]",
      "api_key =  test-key ",
      "Api_Secret=test-secret",
      "[SMS]",
      "body=Doors open at 9",
      "sender = Acme",
      "destination = contacts.xlsx",
    ),
  );

  assert.equal(config.apiKey, "test-key");
  assert.equal(config.apiSecret, "test-secret");
  assert.equal(config.sender, "Acme");
  assert.equal(config.destination, "contacts.xlsx");
});

test("values keep ; and # and are never read as literals", () => {
  const config = parseSettings(
    ini(
      "; credentials",
      ...NEXMO,
      "# message",
      "[SMS]",
      "BODY=Sale; 50% off # today",
      "SENDER=true",
    ),
  );

  assert.equal(config.body, "Sale; 50% off # today");
  assert.equal(config.sender, "true");
});

test("quoteValues quotes key=value lines only", () => {
  assert.equal(
    quoteValues(ini("[SMS]", "; note", "BODY = Hi; there ", "", "SENDER=null")),
    ini("[SMS]", "; note", 'BODY ="Hi; there"', "", 'SENDER="null"'),
  );
});

test("a missing API_KEY is a ConfigError naming the key", () => {
  assert.throws(
    () => parseSettings(ini("[NEXMO]", "API_SECRET=test-secret", ...SMS)),
    {
      name: "ConfigError",
      message: "invalid configuration: NEXMO.API_KEY is missing",
    },
  );
});

test("empty values count as missing", () => {
  assert.throws(
    () => parseSettings(ini(...NEXMO, "[SMS]", "BODY=", "SENDER=   ")),
    {
      name: "ConfigError",
      message:
        "invalid configuration: SMS.BODY is missing; SMS.SENDER is missing",
    },
  );
});

test("a missing section reports every key in it", () => {
  assert.throws(() => parseSettings(ini(...SMS)), {
    name: "ConfigError",
    message:
      "invalid configuration: NEXMO.API_KEY is missing; NEXMO.API_SECRET is missing",
  });
});

test("[EMAIL] falls back to the default SMTP server and texts", () => {
  const config = parseSettings(
    ini(
      ...NEXMO,
      ...SMS,
      "[EMAIL]",
      "SENDER=ops@example.com",
      "PASSWORD=test-password",
    ),
  );

  assert.deepEqual(config.email, {
    from: "ops@example.com",
    password: "test-password",
    ...EMAIL_DEFAULTS,
  });
});

test("[EMAIL] overrides are honoured", () => {
  const config = parseSettings(
    ini(
      ...NEXMO,
      ...SMS,
      "[EMAIL]",
      "SENDER=ops@example.com",
      "PASSWORD=test-password",
      "SMTP=mail.example.com",
      "PORT=2525",
      "SUBJECT=About your SMS",
      "SUCCESS=Check your phone",
      "ERROR=Call us",
    ),
  );

  assert.deepEqual(config.email, {
    from: "ops@example.com",
    password: "test-password",
    smtpHost: "mail.example.com",
    smtpPort: 2525,
    subject: "About your SMS",
    successBody: "Check your phone",
    errorBody: "Call us",
  });
});

test("an incomplete [EMAIL] section is rejected", () => {
  assert.throws(
    () =>
      parseSettings(
        ini(...NEXMO, ...SMS, "[EMAIL]", "SENDER=ops@example.com", "PORT=abc"),
      ),
    {
      name: "ConfigError",
      message:
        "invalid configuration: EMAIL.PASSWORD is missing; EMAIL.PORT must be a positive integer",
    },
  );
});

test("loadSettings reads the file and names it in errors", async () => {
  const good = path.join(dir, "details.ini");
  const bad = path.join(dir, "broken.ini");
  await writeFile(good, ini(...NEXMO, ...SMS));
  await writeFile(bad, ini(...SMS));

  const config = await loadSettings(good);
  assert.equal(config.apiKey, "test-key");

  await assert.rejects(loadSettings(bad), {
    name: "ConfigError",
    message: `invalid configuration ${bad}: NEXMO.API_KEY is missing; NEXMO.API_SECRET is missing`,
  });
});

test("loadSettings fails with ConfigError when the file is missing", async () => {
  const missing = path.join(dir, "nope.ini");

  await assert.rejects(
    loadSettings(missing),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.message.startsWith(`cannot read configuration ${missing}: ENOENT`),
  );
});
