import { describe, expect, it } from "vitest";
import { ConfigurationError, inspectConfig, loadConfig } from "../../src/lib/config";
import { TEST_ENV } from "../helpers";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ ...TEST_ENV });
    expect(config.port).toBe(3000);
    expect(config.requestTimeoutMs).toBe(30000);
    expect(config.debugPayloads).toBe(false);
    expect(config.notion).toEqual({ apiKey: "test-notion-key", version: "2022-06-28" });
    expect(config.jira).toEqual({
      apiToken: "test-jira-token",
      domain: "example.atlassian.net",
      username: "bot@example.com",
      projectKey: "MKTG",
      descriptionLayout: "headed",
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...TEST_ENV,
      PORT: "8080",
      JIRA_PROJECT_KEY: "LEGAL",
      JIRA_DESCRIPTION_LAYOUT: "simple",
      REQUEST_TIMEOUT_MS: "5000",
    });
    expect(config.port).toBe(8080);
    expect(config.jira.projectKey).toBe("LEGAL");
    expect(config.jira.descriptionLayout).toBe("simple");
    expect(config.requestTimeoutMs).toBe(5000);
  });

  it.each(["NOTION_API_KEY", "JIRA_API_TOKEN", "JIRA_DOMAIN", "JIRA_USERNAME"])(
    "fails when %s is missing",
    (name) => {
      const env: Record<string, string | undefined> = { ...TEST_ENV, [name]: undefined };
      expect(() => loadConfig(env)).toThrowError(ConfigurationError);
      expect(() => loadConfig(env)).toThrowError(`Missing required environment variable ${name}`);
    },
  );

  it("rejects an unknown description layout", () => {
    expect(() => loadConfig({ ...TEST_ENV, JIRA_DESCRIPTION_LAYOUT: "fancy" })).toThrowError(
      /Invalid JIRA_DESCRIPTION_LAYOUT value: fancy/,
    );
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ ...TEST_ENV, PORT: "abc" })).toThrowError("Invalid PORT value: abc");
  });

  it("returns a frozen object", () => {
    const config = loadConfig({ ...TEST_ENV });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.jira)).toBe(true);
  });
});

describe("inspectConfig", () => {
  it("lists missing variables without throwing", () => {
    const report = inspectConfig({ NOTION_API_KEY: "test-notion-key", JIRA_DOMAIN: "example.atlassian.net" });
    expect(report).toEqual({
      ok: false,
      missing: ["JIRA_API_TOKEN", "JIRA_USERNAME"],
      projectKey: "MKTG",
      jiraDomain: "example.atlassian.net",
      jiraUsername: null,
    });
  });
});
