#!/usr/bin/env node
import "dotenv/config";
import { createApp } from "./app.js";
import { USAGE, UsageError, parseCommand, runCommand, type Command } from "./commands.js";
import { loadConfig } from "./config.js";
import { ConfigurationError, NotFoundError, errorMessage } from "./core/errors.js";
import { consoleLogger } from "./logger.js";

async function main(): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (err) {
    console.error(`${errorMessage(err)}\n\n${USAGE}`);
    return 1;
  }
  if (command.name === "help") {
    console.log(USAGE);
    return 0;
  }

  const app = createApp(loadConfig(), consoleLogger);
  try {
    console.log(await runCommand(command, app));
    return 0;
  } finally {
    await app.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigurationError || err instanceof NotFoundError || err instanceof UsageError) {
      console.error(err.message);
    } else {
      console.error("Fatal:", err);
    }
    process.exitCode = 1;
  });
