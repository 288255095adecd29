import type { Orchestrator } from "../agents/orchestrator.js";
import type { InstanceSnapshot } from "../agents/types.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import { toHttpError } from "../errors.js";

export interface CommandContext {
  orchestrator: Orchestrator;
  rateLimiter: RateLimiter;
}

export interface CommandReply {
  output: string;
  exit?: boolean;
}

export const HELP_TEXT = [
  "Commands:",
  "/list - Show the mother and worker instances",
  "/stats - Network statistics",
  "/metrics - Rate limiter metrics per endpoint",
  "/clear - Reset the network",
  "/help - Show this help",
  "/exit - Quit",
  "",
  "Anything else is sent to the network as a message.",
].join("\n");

function formatInstance(i: InstanceSnapshot): string {
  const duty = i.responsibility ? ` - ${i.responsibility}` : "";
  return `${i.id} (${i.role}, ${i.modelType}) [${i.status}] ${i.messageCount} msg${duty}`;
}

/** Handles one line of terminal input. Turn errors come back as the same messages the HTTP API gives. */
export async function handleCommand(line: string, ctx: CommandContext): Promise<CommandReply> {
  const input = line.trim();
  if (!input) return { output: "" };

  if (!input.startsWith("/")) {
    try {
      const result = await ctx.orchestrator.submitUserMessage(input);
      const notes = result.degraded ? "\n\n(note: combined raw outputs, synthesis unavailable)" : "";
      return { output: result.finalResponse + notes };
    } catch (err) {
      return { output: `Error: ${toHttpError(err).body.error}` };
    }
  }

  const command = input.slice(1).split(/\s+/)[0]?.toLowerCase();

  switch (command) {
    case "list": {
      const { mother, instances } = ctx.orchestrator.listInstances();
      const lines = [`Mother: ${mother ? formatInstance(mother) : "(not started)"}`];
      if (instances.length === 0) {
        lines.push("No worker instances.");
      } else {
        lines.push(`Instances (${instances.length}):`, ...instances.map((i) => `  ${formatInstance(i)}`));
      }
      return { output: lines.join("\n") };
    }

    case "stats": {
      const stats = ctx.orchestrator.networkStats();
      return {
        output: [
          `Instances: ${stats.instanceCount}`,
          `Messages: ${stats.totalMessages}`,
          `Turns: ${stats.turnCount}`,
          `Mother: ${stats.motherStatus}`,
          `Uptime: ${Math.round(stats.uptime)}s`,
        ].join("\n"),
      };
    }

    case "metrics": {
      const metrics = Object.entries(ctx.rateLimiter.getCallMetrics());
      if (metrics.length === 0) return { output: "No endpoints configured." };
      return {
        output: metrics
          .map(([endpoint, m]) =>
            `${endpoint}: ${m.totalCalls} calls, ${m.failedCalls} failed, ${m.retries} retries, ` +
            `${m.successRate.toFixed(1)}% success, waited ${m.totalWaitSeconds.toFixed(2)}s`)
          .join("\n"),
      };
    }

    case "clear":
      try {
        ctx.orchestrator.clear();
        return { output: "Network cleared. Next message starts fresh." };
      } catch (err) {
        return { output: `Error: ${toHttpError(err).body.error}` };
      }

    case "help":
      return { output: HELP_TEXT };

    case "exit":
    case "quit":
      return { output: "Goodbye!", exit: true };

    default:
      return { output: `Unknown command: /${command}. Type /help for commands.` };
  }
}
