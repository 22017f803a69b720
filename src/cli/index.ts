import crypto from "crypto";
import { buildManualTriggerEvent, createLegalReviewHandler } from "../apps/legalReview/handler";
import { inspectConfig, loadConfig, type AppConfig, type Env } from "../lib/config";
import { errorMessage } from "../lib/errors";
import type { FetchFn } from "../lib/http/fetchWithDeadline";
import { createRequestContext, type LogSink } from "../lib/logging";

type CliCommand = "validate" | "fetch" | "run" | "help";

export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
}

export interface CliRuntimeOptions {
  io?: CliIO;
  env?: Env;
  fetchFn?: FetchFn;
  logSink?: LogSink;
}

const defaultIO: CliIO = {
  // eslint-disable-next-line no-console
  log: (message) => console.log(message),
  // eslint-disable-next-line no-console
  error: (message) => console.error(message),
};

const HELP_TEXT = [
  "Usage: legal-review <command> [pageId]",
  "",
  "Commands:",
  "  validate         Check that the required environment variables are set",
  "  fetch <pageId>   Print the campaign fields read from a Notion page",
  "  run <pageId>     Create the legal review ticket for a Notion page",
  "  help             Show this message",
].join("\n");

function parseCommand(argv: string[]): { command: CliCommand; args: string[] } {
  const raw = argv[0] ?? "help";
  const command: CliCommand =
    raw === "validate" || raw === "fetch" || raw === "run" ? raw : "help";
  return { command, args: argv.slice(1) };
}

function runValidate(io: CliIO, env: Env): number {
  const report = inspectConfig(env);
  const rows: Array<[string, string | null]> = [
    ["Notion API Key", env.NOTION_API_KEY ? "set" : null],
    ["Jira API Token", env.JIRA_API_TOKEN ? "set" : null],
    ["Jira Username", report.jiraUsername],
    ["Jira Domain", report.jiraDomain],
    ["Jira Project", report.projectKey],
  ];
  for (const [label, value] of rows) {
    io.log(`  ${label}: ${value ?? "MISSING"}`);
  }
  if (!report.ok) {
    io.error(`Missing configuration: ${report.missing.join(", ")}`);
    return 1;
  }
  io.log("All configurations are valid.");
  return 0;
}

export async function runCli(argv: string[], options: CliRuntimeOptions = {}): Promise<number> {
  const io = options.io ?? defaultIO;
  const env = options.env ?? process.env;
  const { command, args } = parseCommand(argv);

  if (command === "help") {
    io.log(HELP_TEXT);
    return 0;
  }
  if (command === "validate") {
    return runValidate(io, env);
  }

  const pageId = args[0]?.trim();
  if (!pageId) {
    io.error(`The ${command} command needs a Notion page id.`);
    return 1;
  }

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    io.error(errorMessage(err));
    return 1;
  }

  const handler = createLegalReviewHandler(config, { fetchFn: options.fetchFn });
  const ctx = createRequestContext({ app: "cli", requestId: crypto.randomUUID(), sink: options.logSink });

  if (command === "fetch") {
    try {
      const record = await handler.fetchDocument(ctx, pageId);
      io.log(`Campaign Name: ${record.title}`);
      io.log(`Copy URL: ${record.copyUrl}`);
      io.log(`Design URL: ${record.designUrl}`);
      return 0;
    } catch (err) {
      io.error(`Failed to fetch: ${errorMessage(err)}`);
      return 1;
    }
  }

  const result = await handler.handleWebhook(ctx, buildManualTriggerEvent(pageId));
  switch (result.status) {
    case "success":
      io.log(`Campaign: ${result.title}`);
      io.log(`Jira Ticket: ${result.ticketKey}`);
      io.log(`Jira URL: https://${config.jira.domain}/browse/${result.ticketKey}`);
      return 0;
    case "ignored":
      io.log(`Webhook ignored: ${result.reason}`);
      return 0;
    case "error":
      io.error(`Error: ${result.error}`);
      return 1;
  }
}
