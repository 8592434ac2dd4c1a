// Wires the pieces together: settings → contacts → dispatch → (emails) → report.
import { Command, CommanderError } from "commander";
import {
  ConfigError,
  isFatal,
  type ContactList,
  type EmailSettings,
  type NotifierConfig,
  type RunSummary,
} from "@sms-notifier/shared";
import { VonageSmsClient, type SmsClient } from "./adapters/sms.js";
import { createMailTransport, type MailTransport } from "./adapters/email.js";
import { sendConfirmations } from "./confirmations.js";
import { readContacts } from "./contacts.js";
import { dispatch } from "./dispatcher.js";
import { createLogger, type Logger } from "./logger.js";
import { formatReport, summarize } from "./reporter.js";
import { loadSettings } from "./settings.js";
import { renderMessage } from "./templates/sms.js";

export const DEFAULT_CONFIGURATION = "details.ini";

/** Exit code for a batch cut short by SIGINT/SIGTERM. */
export const EXIT_INTERRUPTED = 130;

export type RunOptions = {
  configuration: string;
  spreadsheet?: string;
  destination?: string;
  email: boolean;
};

export type RunDeps = {
  logger: Logger;
  signal?: AbortSignal;
  createSmsClient?: (config: NotifierConfig) => SmsClient;
  createMailTransport?: (settings: EmailSettings) => MailTransport;
};

const vonageClient = (config: NotifierConfig): SmsClient =>
  new VonageSmsClient({ apiKey: config.apiKey, apiSecret: config.apiSecret });

async function loadContacts(
  options: RunOptions,
  config: NotifierConfig,
  logger: Logger,
): Promise<ContactList> {
  const destination = options.destination?.trim();
  if (destination) {
    // command line override: a single recipient, no spreadsheet
    return {
      contacts: [{ phoneNumber: destination }],
      skipped: 0,
      totalRows: 1,
    };
  }

  const spreadsheet = options.spreadsheet ?? config.destination;
  if (!spreadsheet) {
    throw new ConfigError(
      "no recipients: pass a spreadsheet path, set [SMS] DESTINATION or use --destination",
    );
  }
  return readContacts(spreadsheet, logger);
}

export async function run(
  options: RunOptions,
  { logger, signal, ...deps }: RunDeps,
): Promise<RunSummary> {
  const config = await loadSettings(options.configuration);
  logger.info(
    { configuration: options.configuration, sender: config.sender },
    "configuration loaded",
  );

  const list = await loadContacts(options, config, logger);
  const client = (deps.createSmsClient ?? vonageClient)(config);

  const results = await dispatch(renderMessage(config), list.contacts, client, {
    logger,
    signal,
  });

  if (config.email && options.email && !signal?.aborted) {
    const transport = (deps.createMailTransport ?? createMailTransport)(
      config.email,
    );
    const tally = await sendConfirmations(results, config.email, transport, logger);
    logger.info(tally, "confirmation emails done");
  }

  return summarize(list, results);
}

export function buildProgram() {
  return new Command()
    .name("sms-notifier")
    .description("Send the configured SMS to every contact in a spreadsheet")
    .argument("[spreadsheet]", "contacts file (.xlsx or .csv) with a Phone column")
    .option(
      "-c, --configuration <path>",
      "INI file with [NEXMO] and [SMS] sections",
      DEFAULT_CONFIGURATION,
    )
    .option("-d, --destination <phone>", "send to this one number instead")
    .option("--no-email", "skip confirmation emails even if [EMAIL] is set")
    .exitOverride();
}

export type MainDeps = Partial<RunDeps> & {
  stdout?: (text: string) => void;
};

/** Parses argv, runs the batch and prints the report. Resolves to the exit code. */
export async function main(argv: string[], deps: MainDeps = {}): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const opts = program.opts<{
    configuration: string;
    destination?: string;
    email: boolean;
  }>();
  const logger = deps.logger ?? createLogger();
  const stdout =
    deps.stdout ?? ((text: string) => void process.stdout.write(`${text}\n`));

  try {
    const summary = await run(
      {
        configuration: opts.configuration,
        spreadsheet: program.args[0],
        destination: opts.destination,
        email: opts.email,
      },
      { ...deps, logger },
    );
    stdout(formatReport(summary));
    return deps.signal?.aborted ? EXIT_INTERRUPTED : 0;
  } catch (err) {
    if (isFatal(err)) {
      logger.error({ kind: err.name }, err.message);
    } else {
      logger.error({ err }, "notifier fatal");
    }
    return 1;
  }
}
