import { describe, expect, it } from "vitest";
import { pino } from "pino";
import { loadConfig } from "./ConfigStore.js";
import { logConfigStatus, validateConfig } from "./ConfigValidator.js";
import { enabledServices, enabledTextProviders } from "../ServiceRegistry.js";

const allKeys = {
  CLAUDE_API_KEY: "test-claude-key",
  GEMINI_API_KEY: "test-gemini-key",
  STABILITY_API_KEY: "test-stability-key",
};

describe("validateConfig", () => {
  it("passes a fully credentialed configuration", () => {
    expect(validateConfig(loadConfig(allKeys))).toEqual({ issues: [], overallPass: true });
  });

  it("reports every enabled provider without a credential, in check order", () => {
    const report = validateConfig(loadConfig({}));

    expect(report.issues.map((issue) => issue.message)).toEqual([
      "CLAUDE_API_KEY missing but claude is enabled",
      "GEMINI_API_KEY missing but gemini is enabled",
      "STABILITY_API_KEY missing but stability_ai is enabled",
    ]);
    expect(report.overallPass).toBe(false);
  });

  it("reports exactly one missing credential naming the provider", () => {
    const snapshot = loadConfig({ ...allKeys, GEMINI_API_KEY: "" });
    const report = validateConfig(snapshot);

    expect(report.issues).toEqual([
      {
        kind: "missing_credential",
        provider: "gemini",
        message: "GEMINI_API_KEY missing but gemini is enabled",
      },
    ]);
    expect(enabledTextProviders(snapshot)).toEqual(["claude"]);
  });

  it("does not report a missing credential for a disabled provider", () => {
    const report = validateConfig(loadConfig({ ...allKeys, STABILITY_API_KEY: undefined, STABILITY_ENABLED: "false" }));

    expect(report.overallPass).toBe(true);
  });

  it("reports when every text provider is disabled", () => {
    const snapshot = loadConfig({
      CLAUDE_ENABLED: "false",
      GEMINI_ENABLED: "false",
      STABILITY_API_KEY: "test-stability-key",
    });
    const report = validateConfig(snapshot);

    expect(report.issues).toEqual([{ kind: "no_text_provider", message: "No text-generation provider enabled" }]);
    expect(enabledTextProviders(snapshot)).toEqual([]);
  });

  it("accepts a timeout of exactly five seconds", () => {
    expect(validateConfig(loadConfig({ ...allKeys, LLM_TIMEOUT: "5" })).overallPass).toBe(true);
  });

  it("flags a timeout of four seconds without changing it", () => {
    const snapshot = loadConfig({ ...allKeys, LLM_TIMEOUT: "4" });
    const report = validateConfig(snapshot);

    expect(report.issues).toEqual([
      { kind: "unsafe_timeout", message: "LLM_TIMEOUT too low (minimum 5 seconds)" },
    ]);
    expect(snapshot.timeoutSeconds).toBe(4);
  });

  it("returns identical reports for repeated calls", () => {
    const snapshot = loadConfig({ CLAUDE_ENABLED: "false", LLM_TIMEOUT: "2" });

    expect(validateConfig(snapshot)).toEqual(validateConfig(snapshot));
  });

  it("reports only the image provider when claude is usable and gemini disabled", () => {
    const snapshot = loadConfig({
      CLAUDE_API_KEY: "test-claude-key",
      GEMINI_ENABLED: "false",
      LLM_TIMEOUT: "30",
    });
    const report = validateConfig(snapshot);

    expect(report.issues).toEqual([
      {
        kind: "missing_credential",
        provider: "stability_ai",
        message: "STABILITY_API_KEY missing but stability_ai is enabled",
      },
    ]);
    expect(report.overallPass).toBe(false);
    expect(enabledTextProviders(snapshot)).toEqual(["claude"]);
    expect(enabledServices(snapshot)).toEqual(["claude"]);
  });

  it("reports only the timeout when both text providers are usable and the image provider is disabled", () => {
    const snapshot = loadConfig({
      CLAUDE_API_KEY: "test-claude-key",
      GEMINI_API_KEY: "test-gemini-key",
      STABILITY_ENABLED: "false",
      LLM_TIMEOUT: "3",
    });
    const report = validateConfig(snapshot);

    expect(report.issues.map((issue) => issue.kind)).toEqual(["unsafe_timeout"]);
    expect(report.overallPass).toBe(false);
    expect(enabledServices(snapshot)).toEqual(["claude", "gemini"]);
  });
});

describe("logConfigStatus", () => {
  function captureLogger() {
    const lines: { level: number; msg: string }[] = [];
    const log = pino(
      { level: "info" },
      {
        write(line: string) {
          lines.push(JSON.parse(line));
        },
      },
    );
    return { log, lines };
  }

  it("logs credential presence without the secret", () => {
    const snapshot = loadConfig(allKeys);
    const { log, lines } = captureLogger();

    logConfigStatus(snapshot, validateConfig(snapshot), log);

    const messages = lines.map((line) => line.msg);
    expect(messages).toContain("claude enabled: true, API key: ✓");
    expect(messages).toContain("Enabled services: [claude, gemini, stability_ai]");
    expect(messages).toContain("Configuration valid");
    expect(messages.some((message) => message.includes("test-claude-key"))).toBe(false);
  });

  it("logs each issue and the wildcard origin as warnings", () => {
    const snapshot = loadConfig({
      ...allKeys,
      LLM_TIMEOUT: "1",
      NODE_ENV: "development",
      ALLOW_DEV_WILDCARD_ORIGIN: "yes",
    });
    const { log, lines } = captureLogger();

    logConfigStatus(snapshot, validateConfig(snapshot), log);

    const warnings = lines.filter((line) => line.level === 40).map((line) => line.msg);
    expect(warnings).toEqual([
      "Development mode: CORS accepts requests from any origin",
      "Configuration issue: LLM_TIMEOUT too low (minimum 5 seconds)",
    ]);
  });
});
