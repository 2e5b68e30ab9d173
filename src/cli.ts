#!/usr/bin/env node

import "dotenv/config";
import path from "node:path";
import chalk from "chalk";
import { Command, InvalidArgumentError, Option } from "commander";
import ora from "ora";
import { applyOverrides, loadConfig, type RawConfig } from "./config/loader.js";
import { resolveConfig } from "./config/validator.js";
import { bulkMr, type BulkMrResult } from "./commands/bulk-mr.js";
import { bulkMrTopic } from "./commands/bulk-mr-topic.js";
import { EXIT } from "./commands/exit-codes.js";
import { listProjects, listTopics } from "./commands/listing.js";
import { mergeInteractive } from "./commands/merge.js";
import { createTerminalConfirm } from "./commands/prompt.js";
import {
  mergeEventLine,
  mergeSummaryLine,
  renderMergeEvent,
  renderMergeSummary,
  renderProjects,
  renderResult,
  renderSummary,
  renderTopics,
  resultLine,
  summaryLine,
} from "./commands/render.js";
import { logReconcileEvents } from "./core/reconciler.js";
import { GitLabClient } from "./gitlab/client.js";
import { createLogger, type Logger } from "./logging/logger.js";
import type { OutputFormat, ToolConfig } from "./types/config.js";

type ConnectionOpts = {
  gitlabUrl?: string;
  token?: string;
  config?: string;
  env?: string;
  format?: OutputFormat;
  verbose?: boolean;
};

type Session = {
  config: ToolConfig;
  format: OutputFormat;
  verbose: boolean;
  logger: Logger;
  client: GitLabClient;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseInteger(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n)) throw new InvalidArgumentError("Not a number.");
  return n;
}

function withConnectionOptions(cmd: Command): Command {
  return cmd
    .option("--gitlab-url <url>", "GitLab base URL (default: GITLAB_BASE_URL env)")
    .option("--token <token>", "GitLab API token (default: GITLAB_TOKEN env)")
    .option("--config <path>", "Path to config directory")
    .option("--env <name>", "Config overlay from the config directory, e.g. ci")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]))
    .option("--verbose", "Enable verbose logging");
}

function fail(message: string, exitCode: number, format: OutputFormat = "human"): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code: "FAILED", message }) + "\n");
  } else {
    console.error(chalk.red(`Error: ${message}`));
  }
  process.exit(exitCode);
}

function openSession(opts: ConnectionOpts): Session {
  let raw: RawConfig;
  try {
    raw = loadConfig(opts.env, opts.config ? path.resolve(opts.config) : undefined);
  } catch (e: unknown) {
    fail(e instanceof Error ? e.message : String(e), EXIT.INVALID_ARGS, opts.format);
  }

  const resolved = resolveConfig(
    applyOverrides(raw, { base_url: opts.gitlabUrl, token: opts.token, format: opts.format }),
  );
  if (!resolved.ok) fail(resolved.error, EXIT.INVALID_ARGS, opts.format);

  const { config } = resolved;
  const verbose = opts.verbose ?? false;
  const logger = createLogger({ format: config.format, verbose });
  const client = new GitLabClient({
    baseUrl: config.base_url,
    token: config.token,
    timeoutMs: config.timeout_ms,
    logger,
  });

  return { config, format: config.format, verbose, logger, client };
}

function report(res: BulkMrResult, format: OutputFormat): never {
  if (!res.ok) fail(res.error, res.exitCode, format);

  if (format === "jsonl") {
    for (const result of res.results) process.stdout.write(resultLine(result));
    process.stdout.write(summaryLine(res.summary));
  } else {
    for (const result of res.results) process.stdout.write(renderResult(result));
    process.stdout.write("\n" + renderSummary(res.summary));
  }
  process.exit(res.exitCode);
}

const program = new Command();

program
  .name("glmr")
  .description("Bulk merge-request automation for self-hosted GitLab")
  .version("1.0.0");

withConnectionOptions(
  program
    .command("bulk-mr")
    .description("Create merge requests from origin to target branch across multiple projects")
    .option("--origin <branch>", "Origin (source) branch name (required)")
    .option("--target <branch>", "Target branch name (required)")
    .option("--project <path>", "Project path (can be repeated)", collect, [])
    .option("--group <group>", "Default group/namespace prefix for bare project names"),
).action(
  async (opts: ConnectionOpts & { origin?: string; target?: string; project: string[]; group?: string }) => {
    const session = openSession(opts);
    const res = await bulkMr(
      { origin: opts.origin, target: opts.target, projects: opts.project, group: opts.group, verbose: session.verbose },
      session.client,
      {
        observer: logReconcileEvents(session.logger),
        onProjectsResolved: (projects) => {
          if (session.format === "human") console.log(`Processing ${projects.length} project(s)...\n`);
        },
      },
    );
    report(res, session.format);
  },
);

withConnectionOptions(
  program
    .command("bulk-mr-topic")
    .description("Create merge requests from origin to target branch for all projects in a topic")
    .option("--origin <branch>", "Origin (source) branch name (required)")
    .option("--target <branch>", "Target branch name (required)")
    .option("--topic <topic>", "Topic name (required)")
    .option("--exclude <pattern>", "Skip project paths matching this glob (can be repeated)", collect, [])
    .option("--per-page <n>", "Number of projects to fetch per page", parseInteger),
).action(
  async (opts: ConnectionOpts & { origin?: string; target?: string; topic?: string; exclude: string[]; perPage?: number }) => {
    const session = openSession(opts);
    const spinner = ora({ text: `Fetching projects for topic: ${opts.topic ?? ""}`, isSilent: session.format === "jsonl" });
    if (opts.topic) spinner.start();

    const res = await bulkMrTopic(
      {
        origin: opts.origin,
        target: opts.target,
        topic: opts.topic,
        exclude: opts.exclude,
        perPage: opts.perPage ?? session.config.per_page,
        verbose: session.verbose,
      },
      session.client,
      {
        observer: logReconcileEvents(session.logger),
        onProjectsResolved: (projects) => {
          if (projects.length === 0) {
            spinner.info(`No projects found for topic: ${opts.topic ?? ""}`);
          } else {
            spinner.succeed(`Found ${projects.length} project(s) in topic ${chalk.bold.magenta(opts.topic ?? "")}`);
          }
        },
      },
    );
    if (!res.ok) spinner.stop();
    report(res, session.format);
  },
);

withConnectionOptions(
  program
    .command("merge")
    .description("Interactively merge open MRs by target branch and topic")
    .option("--target <branch>", "Target branch to merge into (required)")
    .option("--topic <topic>", "Topic to filter projects (required)")
    .option("--per-page <n>", "Number of projects to fetch per page", parseInteger),
).action(async (opts: ConnectionOpts & { target?: string; topic?: string; perPage?: number }) => {
  const session = openSession(opts);
  const jsonl = session.format === "jsonl";
  // under jsonl stdout carries only records; the dialogue moves to stderr
  const terminal = createTerminalConfirm(chalk, process.stdin, jsonl ? process.stderr : process.stdout);

  if (session.format === "human" && opts.topic) {
    console.log(chalk.cyan(`📦 Fetching projects for topic: ${opts.topic}`));
  }

  const res = await mergeInteractive(
    { target: opts.target, topic: opts.topic, perPage: opts.perPage ?? session.config.per_page },
    session.client,
    terminal.confirm,
    (event) => process.stdout.write(jsonl ? mergeEventLine(event) : renderMergeEvent(event)),
  ).finally(() => terminal.close());

  if (!res.ok) fail(res.error, res.exitCode, session.format);

  if (jsonl) {
    process.stdout.write(mergeSummaryLine(res.summary));
  } else {
    if (res.summary.projects === 0) console.log(chalk.yellow(`⚠️  No projects found for topic: ${opts.topic ?? ""}`));
    process.stdout.write(renderMergeSummary(res.summary));
  }
  process.exit(res.exitCode);
});

withConnectionOptions(
  program
    .command("topics")
    .description("List GitLab topics")
    .option("--page <n>", "Page number", parseInteger, 1)
    .option("--per-page <n>", "Number of topics per page", parseInteger, 50),
).action(async (opts: ConnectionOpts & { page: number; perPage: number }) => {
  const session = openSession(opts);
  const res = await listTopics({ page: opts.page, perPage: opts.perPage }, session.client);
  if (!res.ok) fail(res.error, res.exitCode, session.format);

  if (session.format === "jsonl") {
    for (const topic of res.topics) process.stdout.write(JSON.stringify(topic) + "\n");
  } else {
    process.stdout.write(renderTopics(res.topics));
  }
});

withConnectionOptions(
  program
    .command("projects")
    .description("List projects for a specific topic")
    .option("--topic <topic>", "Topic name (required)")
    .option("--page <n>", "Page number", parseInteger, 1)
    .option("--per-page <n>", "Number of projects per page", parseInteger, 50),
).action(async (opts: ConnectionOpts & { topic?: string; page: number; perPage: number }) => {
  const session = openSession(opts);
  const res = await listProjects({ topic: opts.topic, page: opts.page, perPage: opts.perPage }, session.client);
  if (!res.ok) fail(res.error, res.exitCode, session.format);

  if (session.format === "jsonl") {
    for (const project of res.projects) process.stdout.write(JSON.stringify(project) + "\n");
  } else {
    process.stdout.write(renderProjects(res.topic, res.projects));
  }
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
