#!/usr/bin/env tsx
import { createLogger } from "./logger.js";
import { main } from "./notifier.js";

const logger = createLogger();
const controller = new AbortController();

// First signal stops the batch after the current send; a second one exits.
const stop = (signal: NodeJS.Signals) => {
  if (controller.signal.aborted) process.exit(130);
  logger.warn({ signal }, "stopping after the current message");
  controller.abort();
};
process.on("SIGINT", stop);
process.on("SIGTERM", stop);

main(process.argv, { logger, signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    logger.error(e, "notifier fatal");
    process.exit(1);
  });
