#!/usr/bin/env node
import { createInterface } from "node:readline";
import { loadConfig } from "./config.js";
import { logger } from "./utils/logger.js";
import { createNetwork } from "./network.js";
import { handleCommand, HELP_TEXT } from "./handlers/commands.js";

async function main() {
  const config = loadConfig();
  // Keep the prompt readable unless a level was asked for explicitly
  logger.level = process.env.LOG_LEVEL ? config.logLevel : "warn";

  const ctx = createNetwork(config);
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: "you> " });

  console.log(`Agent mesh ready.\n\n${HELP_TEXT}`);
  rl.prompt();

  rl.on("SIGINT", () => {
    if (ctx.orchestrator.cancelTurn()) {
      console.log("\nCancelling current request...");
    } else {
      rl.close();
    }
  });

  for await (const line of rl) {
    const reply = await handleCommand(line, ctx);
    if (reply.output) console.log(reply.output);
    if (reply.exit) break;
    rl.prompt();
  }

  rl.close();
}

main().catch((err) => {
  logger.fatal(err, "Fatal error");
  process.exit(1);
});
