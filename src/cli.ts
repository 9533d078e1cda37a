#!/usr/bin/env node
import { Command } from "commander";
import process from "node:process";
import chalk from "chalk";
import { loadConfig } from "./nexus/config.js";
import type { NexusConfig } from "./nexus/config.js";
import { createChildLogger, setLogLevel } from "./nexus/logger.js";
import { createOrchestrator } from "./nexus/orchestrator/index.js";
import type { RunInput, RunResult } from "./nexus/orchestrator/index.js";
import { startHttpServer } from "./server/http.js";
import { VERSION } from "./version.js";

const log = createChildLogger({ service: "cli" });

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0,           // Answered with every activated specialist healthy
  DEGRADED: 10,    // Answered, but some specialist failed or timed out
  CLARIFY: 20,     // The query needs clarification
  ERROR: 30,       // No answer could be produced
  CANCELLED: 40,   // Cancelled by user (SIGINT/SIGTERM)
} as const;

function parsePositiveInt(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

function configOrExit(): Readonly<NexusConfig> {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    return config;
  } catch (err) {
    process.stderr.write(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}\n`));
    process.exit(EXIT_CODES.ERROR);
  }
}

const program = new Command();

program.name("nexus").description("Multi-specialist query orchestrator").version(VERSION);

program
  .command("run")
  .description("Answer a query through the router, the specialists and the synthesizer")
  .argument("<query>", "The question to answer")
  .option("--user <id>", "User id carried with the run", "anonymous")
  .option("--role <role>", "User role carried with the run", "user")
  .option("--max-iterations <n>", "Per-specialist iteration bound")
  .option("--timeout <ms>", "Run deadline in ms")
  .option("--json", "Output full JSON result", false)
  .action(async (query: string, opts: { user: string; role: string; maxIterations?: string; timeout?: string; json: boolean }) => {
    const config = configOrExit();

    const abortController = new AbortController();
    let cancelled = false;

    const handleSignal = (signal: string) => {
      if (cancelled) {
        process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
        process.exit(EXIT_CODES.CANCELLED);
      }
      cancelled = true;
      process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
      abortController.abort();
    };

    process.on("SIGINT", () => handleSignal("SIGINT"));
    process.on("SIGTERM", () => handleSignal("SIGTERM"));

    try {
      const orchestrator = createOrchestrator(config);

      const input: RunInput = {
        query,
        userId: opts.user,
        userRole: opts.role,
        abortSignal: abortController.signal
      };
      const overrides: NonNullable<RunInput["config"]> = {};
      if (opts.maxIterations !== undefined) {
        overrides.maxIterations = parsePositiveInt(opts.maxIterations, "--max-iterations");
      }
      if (opts.timeout !== undefined) {
        overrides.runTimeoutMs = parsePositiveInt(opts.timeout, "--timeout");
      }
      if (Object.keys(overrides).length > 0) input.config = overrides;

      const reasoning = orchestrator.reasoningStatus;
      process.stderr.write(chalk.blue(`Query: "${query}"\n`));
      process.stderr.write(chalk.dim(`  Reasoning: ${reasoning.provider} (${reasoning.model})\n`));
      if (!reasoning.configured) {
        process.stderr.write(chalk.yellow("  No REASONING_API_KEY set; answers come from the stub client\n"));
      }
      process.stderr.write("\n");

      const result = await orchestrator.run(input);

      if (opts.json) {
        process.stdout.write(JSON.stringify(result, null, 2) + "\n");
      } else {
        outputResultHuman(result);
      }

      process.exit(resultToExitCode(result, cancelled));

    } catch (err) {
      log.debug({ err }, "run command failed");
      process.stderr.write(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}\n`));
      process.exit(EXIT_CODES.ERROR);
    }
  });

program
  .command("serve")
  .description("Run the HTTP API")
  .option("--host <host>", "Interface to bind (defaults to HOST)")
  .option("--port <port>", "Port (defaults to PORT)")
  .action((opts: { host?: string; port?: string }) => {
    const base = configOrExit();
    const server = {
      host: opts.host ?? base.server.host,
      port: opts.port !== undefined ? parsePositiveInt(opts.port, "--port") : base.server.port
    };
    const config: Readonly<NexusConfig> = { ...base, server };
    log.info(
      {
        reasoning: {
          baseUrl: config.reasoning.baseUrl,
          model: config.reasoning.model,
          routerModel: config.reasoning.routerModel,
          configured: config.reasoning.apiKey !== undefined
        },
        server
      },
      "Configuration loaded"
    );
    startHttpServer({ config, orchestrator: createOrchestrator(config) });
  });

program
  .command("specialists")
  .description("List the specialists and their capabilities")
  .action(() => {
    const orchestrator = createOrchestrator(configOrExit());
    for (const specialist of orchestrator.catalog()) {
      process.stdout.write(chalk.bold(`${specialist.id}`) + chalk.dim(` - ${specialist.name}\n`));
      process.stdout.write(`  ${specialist.description}\n`);
      process.stdout.write(chalk.dim(`  capabilities: ${specialist.capabilities.join(", ")}\n`));
    }
  });

/**
 * Map run result to exit code.
 */
function resultToExitCode(result: RunResult, cancelled: boolean): number {
  if (cancelled) {
    return EXIT_CODES.CANCELLED;
  }
  switch (result.status) {
    case "ok":
      return EXIT_CODES.OK;
    case "degraded":
      return EXIT_CODES.DEGRADED;
    case "clarify":
      return EXIT_CODES.CLARIFY;
    case "failed":
      return EXIT_CODES.ERROR;
    default:
      return EXIT_CODES.ERROR;
  }
}

/**
 * Output run result in human-readable format.
 */
function outputResultHuman(result: RunResult): void {
  const involved = result.specialistsInvolved.join(", ") || "none";

  switch (result.status) {
    case "ok":
      process.stderr.write(chalk.green("✓ Answered\n"));
      break;
    case "degraded":
      process.stderr.write(chalk.yellow("⚠ Answered with degraded specialists\n"));
      for (const s of result.specialists.filter((o) => o.status === "degraded" || o.status === "timed_out")) {
        process.stderr.write(chalk.dim(`  ${s.specialist}: ${s.status}${s.error ? ` (${s.error.message})` : ""}\n`));
      }
      break;
    case "clarify":
      process.stderr.write(chalk.magenta("? Clarification needed\n"));
      break;
    case "failed":
      process.stderr.write(chalk.red(`✗ Run failed: [${result.error?.code ?? "INTERNAL"}] ${result.error?.message ?? ""}\n`));
      break;
  }
  process.stderr.write(chalk.dim(`  Routing: ${result.routingDecision}  Specialists: ${involved}  ${result.durationMs}ms\n\n`));
  process.stdout.write(result.finalResponse + "\n");
}

await program.parseAsync(process.argv);
