#!/usr/bin/env node

import { mkdirSync, writeFileSync } from "node:fs";
import {
  loadConfig,
  getConfigDir,
  getConfigPath,
  configExists,
} from "./config.js";
import { initLogger, getLogger } from "./util/logger.js";
import { createRuntime, type Runtime } from "./runtime.js";
import { ApiServer } from "./api/server.js";
import { describeRecurrence } from "./recurrence/calculator.js";

function printUsage(): void {
  console.log(`
research-scheduler — Scheduled research reports

Usage:
  research-scheduler start              Start the scanner, worker pool and API server
  research-scheduler init               Create an example config
  research-scheduler schedules          List schedules and their next run
  research-scheduler run <scheduleId>   Run a schedule now and wait for it
  research-scheduler scan               Run one due-schedule scan and wait for its runs
  research-scheduler help               Show this help

Options:
  --config <path>   Path to config file (default: ~/.research-scheduler/config.json)
`);
}

function configPathFrom(args: string[]): string | undefined {
  const idx = args.indexOf("--config");
  return idx >= 0 ? args[idx + 1] : undefined;
}

function positional(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--config") {
      i++;
      continue;
    }
    result.push(args[i]);
  }
  return result;
}

function openRuntime(configPath?: string): Runtime {
  const config = loadConfig(configPath);
  initLogger(config.log.level);
  return createRuntime(config);
}

function cmdInit(): void {
  const configDir = getConfigDir();
  mkdirSync(configDir, { recursive: true });

  if (configExists()) {
    console.log(`Config already exists at ${getConfigPath()}`);
    return;
  }

  const exampleConfig = {
    llm: {
      baseUrl: "https://api.openai.com/v1",
      apiKey: "YOUR_LLM_API_KEY",
      model: "gpt-4o-mini",
    },
    search: {
      endpoint: "https://api.bing.microsoft.com",
      apiKey: "YOUR_SEARCH_API_KEY",
      topK: 6,
    },
    email: {
      host: "smtp.example.com",
      port: 587,
      secure: false,
      user: "reports@example.com",
      pass: "YOUR_SMTP_PASSWORD",
      from: "Research Reports <reports@example.com>",
      appBaseUrl: "http://localhost:8790",
    },
    scanner: {
      schedule: "*/5 * * * *",
      timezone: "UTC",
      maxConcurrent: 3,
    },
    retention: {
      days: 90,
    },
    prices: {
      endpoint: "https://query1.finance.yahoo.com",
    },
    server: {
      port: 8790,
      token: "CHANGE_ME",
    },
    log: {
      level: "info",
    },
  };

  writeFileSync(getConfigPath(), JSON.stringify(exampleConfig, null, 2) + "\n");
  console.log(`Created config at ${getConfigPath()}`);
  console.log("\nNext steps:");
  console.log(`1. Edit ${getConfigPath()} with your API keys and SMTP settings`);
  console.log("2. Run 'research-scheduler start'");
}

function cmdSchedules(configPath?: string): void {
  const runtime = openRuntime(configPath);
  try {
    const list = runtime.schedules.list();
    if (list.length === 0) {
      console.log("No schedules yet. Create one with POST /api/schedules.");
      return;
    }

    console.log(`\n  Schedules (${list.length})\n`);
    for (const schedule of list) {
      const subject = schedule.title ?? (schedule.prompt || schedule.symbols.join(", "));
      console.log(`  ${schedule.active ? "* " : "  "}${schedule.id}`);
      console.log(`    Owner:    ${schedule.ownerId}`);
      console.log(`    Subject:  ${subject}`);
      console.log(`    Repeats:  ${describeRecurrence(schedule.recurrence)}`);
      console.log(`    Next run: ${schedule.nextRunAt ?? "N/A"}`);
      console.log(`    Email:    ${schedule.email.to.length > 0 ? schedule.email.to.join(", ") : "-"}`);
      console.log(`    Active:   ${schedule.active ? "ON" : "OFF"}`);
      console.log();
    }
  } finally {
    runtime.db.close();
  }
}

async function cmdRun(scheduleId: string | undefined, configPath?: string): Promise<void> {
  if (!scheduleId) {
    console.error("Usage: research-scheduler run <scheduleId>");
    process.exit(1);
  }

  const runtime = openRuntime(configPath);
  try {
    const schedule = runtime.schedules.get(scheduleId);
    if (!schedule) {
      console.error(`Schedule not found: ${scheduleId}`);
      process.exitCode = 1;
      return;
    }

    console.log(`Running schedule: ${scheduleId}...`);
    const run = runtime.dispatcher.runNow(schedule);
    await runtime.dispatcher.onIdle();

    const finished = runtime.runs.get(run.id);
    console.log(`\nRun ${run.id} (${finished?.status ?? "unknown"})`);
    console.log(`Duration: ${finished?.durationMs ?? 0}ms`);
    if (finished?.reportId) console.log(`Report:   ${finished.reportId}`);
    if (finished?.emailError) console.log(`Email:    ${finished.emailError}`);
    if (finished?.error) {
      console.log(`Error:    ${finished.error}`);
      process.exitCode = 1;
    }
  } finally {
    runtime.db.close();
  }
}

async function cmdScan(configPath?: string): Promise<void> {
  const runtime = openRuntime(configPath);
  try {
    const summary = runtime.scanner.scan(new Date());
    console.log(
      `Due: ${summary.due}, triggered: ${summary.triggered}, skipped: ${summary.skipped}, failed: ${summary.failed}`,
    );
    await runtime.dispatcher.onIdle();
    for (const runId of summary.runIds) {
      const run = runtime.runs.get(runId);
      console.log(`  ${runId}: ${run?.status ?? "unknown"}${run?.error ? ` (${run.error})` : ""}`);
    }
  } finally {
    runtime.db.close();
  }
}

async function cmdStart(configPath?: string): Promise<void> {
  const config = loadConfig(configPath);
  initLogger(config.log.level);
  const log = getLogger("main");

  log.info("starting research-scheduler");

  const runtime = createRuntime(config);

  let server: ApiServer | null = null;
  if (config.server) {
    server = new ApiServer(config.server);
    server.setRouter(runtime.router);
    await server.start();
  }

  const resumed = runtime.dispatcher.resumeIncomplete();
  runtime.scanner.start();
  runtime.retention.start();

  // Graceful shutdown
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal, active: runtime.dispatcher.activeCount() }, "shutting down");
    runtime.scanner.stop();
    runtime.retention.stop();
    if (server) await server.stop();
    await runtime.dispatcher.onIdle();
    runtime.db.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((e) => {
      log.error({ err: e }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  log.info({ resumed, schedules: runtime.schedules.count() }, "research-scheduler is running");
}

// CLI entry point
const args = process.argv.slice(2);
const configPath = configPathFrom(args);
const [command, ...rest] = positional(args);

function fail(e: unknown): never {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exit(1);
}

switch (command) {
  case "start":
  case undefined:
    cmdStart(configPath).catch((e) => {
      console.error("Fatal:", e instanceof Error ? e.message : e);
      process.exit(1);
    });
    break;

  case "init":
    try {
      cmdInit();
    } catch (e) {
      fail(e);
    }
    break;

  case "schedules":
    try {
      cmdSchedules(configPath);
    } catch (e) {
      fail(e);
    }
    break;

  case "run":
    cmdRun(rest[0], configPath).catch(fail);
    break;

  case "scan":
    cmdScan(configPath).catch(fail);
    break;

  case "help":
  case "--help":
  case "-h":
    printUsage();
    break;

  default:
    console.error(`Unknown command: ${command}`);
    printUsage();
    process.exit(1);
}
