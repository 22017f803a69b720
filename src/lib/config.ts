import dotenv from "dotenv";

dotenv.config();

export type DescriptionLayoutName = "simple" | "headed";

export interface NotionConfig {
  apiKey: string;
  version: string;
}

export interface JiraConfig {
  apiToken: string;
  domain: string;
  username: string;
  projectKey: string;
  descriptionLayout: DescriptionLayoutName;
}

export interface AppConfig {
  port: number;
  requestTimeoutMs: number;
  debugPayloads: boolean;
  notion: NotionConfig;
  jira: JiraConfig;
}

export type Env = Record<string, string | undefined>;

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export const REQUIRED_ENV_VARS = [
  "NOTION_API_KEY",
  "JIRA_API_TOKEN",
  "JIRA_DOMAIN",
  "JIRA_USERNAME",
] as const;

export const DEFAULT_JIRA_PROJECT_KEY = "MKTG";

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable ${name}`);
  }
  return value;
}

function parsePositiveInt(env: Env, name: string, fallback: string): number {
  const raw = env[name] ?? fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function parseLayout(env: Env): DescriptionLayoutName {
  const raw = env.JIRA_DESCRIPTION_LAYOUT ?? "headed";
  if (raw !== "simple" && raw !== "headed") {
    throw new ConfigurationError(
      `Invalid JIRA_DESCRIPTION_LAYOUT value: ${raw} (expected "simple" or "headed")`,
    );
  }
  return raw;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    port: parsePositiveInt(env, "PORT", "3000"),
    requestTimeoutMs: parsePositiveInt(env, "REQUEST_TIMEOUT_MS", "30000"),
    debugPayloads: env.DEBUG_PAYLOADS === "1",
    notion: {
      apiKey: requireEnv(env, "NOTION_API_KEY"),
      version: env.NOTION_VERSION ?? "2022-06-28",
    },
    jira: {
      apiToken: requireEnv(env, "JIRA_API_TOKEN"),
      domain: requireEnv(env, "JIRA_DOMAIN"),
      username: requireEnv(env, "JIRA_USERNAME"),
      projectKey: env.JIRA_PROJECT_KEY || DEFAULT_JIRA_PROJECT_KEY,
      descriptionLayout: parseLayout(env),
    },
  };

  Object.freeze(config.notion);
  Object.freeze(config.jira);
  return Object.freeze(config);
}

export interface ConfigReport {
  ok: boolean;
  missing: string[];
  projectKey: string;
  jiraDomain: string | null;
  jiraUsername: string | null;
}

/**
 * Non-throwing variant of {@link loadConfig} for diagnostics: reports which
 * required variables are absent.
 */
export function inspectConfig(env: Env = process.env): ConfigReport {
  const missing = REQUIRED_ENV_VARS.filter((name) => !env[name]);
  return {
    ok: missing.length === 0,
    missing,
    projectKey: env.JIRA_PROJECT_KEY || DEFAULT_JIRA_PROJECT_KEY,
    jiraDomain: env.JIRA_DOMAIN || null,
    jiraUsername: env.JIRA_USERNAME || null,
  };
}
