#!/usr/bin/env node
import "reflect-metadata";
import { Command } from "commander";
import { agents } from "./commands/agents";
import { ask } from "./commands/ask";
import { history } from "./commands/history";

type Opts = Record<string, unknown>;

function withSharedOptions(command: Command) {
  return command
    .option("-c, --config <path>", "Path to configuration file")
    .option("-m, --model <id>", "Override the default model (provider:model)")
    .option("--sessions-root <dir>", "Override the session storage directory")
    .option("--log-level <level>", "silent, error, warn, info, debug or trace");
}

const program = new Command();

program
  .name("switchboard")
  .description("Route questions to a router agent that answers or delegates to sub-agents");

withSharedOptions(
  program
    .command("ask")
    .argument("<question>", "Question for the router agent")
    .requiredOption("-u, --user <id>", "User identifier")
    .option("-s, --session <id>", "Continue an existing session")
).action(async (question: string, options: Opts) => {
  await ask(question, options);
});

withSharedOptions(program.command("agents").description("List registered agents")).action(
  async (options: Opts) => {
    await agents(options);
  }
);

withSharedOptions(
  program
    .command("history")
    .description("Print a session's conversation log")
    .argument("<sessionId>", "Session identifier")
    .option("-a, --agent <name>", "Agent whose log to print (defaults to the router)")
).action(async (sessionId: string, options: Opts) => {
  await history(sessionId, options);
});

void program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exit(1);
});
