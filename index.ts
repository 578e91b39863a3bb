#!/usr/bin/env tsx
import { Command } from "commander";
import { registerChainCommand } from "./command/chain";
import { registerOptimizeCommand } from "./command/optimize";
import { registerOrchestrateCommand } from "./command/orchestrate";
import { registerParallelCommand } from "./command/parallel";
import { registerRouteCommand } from "./command/route";
import { EXIT_CODES } from "./command/shared";
import { logger } from "./core/logger";
import { describeError } from "./orchestrator/orchestrator.types";

const program = new Command();

program
  .name("workflows")
  .description("Prompt workflows: chain, route, parallel, orchestrate and optimize.")
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => cmd.name(),
  });

registerChainCommand(program);
registerRouteCommand(program);
registerParallelCommand(program);
registerOrchestrateCommand(program);
registerOptimizeCommand(program);

// Errors thrown while reading input or config files are execution errors.
program.parseAsync().catch((error: unknown) => {
  logger.error(describeError(error));
  process.exitCode = EXIT_CODES.execution;
});
