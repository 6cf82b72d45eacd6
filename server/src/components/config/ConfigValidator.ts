import type { Logger } from "pino";
import type { ConfigSnapshot } from "#types/appConfig";
import { IMAGE_PROVIDERS, TEXT_PROVIDERS, type ProviderName } from "#types/provider";
import type { ValidationIssue, ValidationReport } from "#types/validation";
import { credentialVariable, WILDCARD_ORIGIN } from "./ConfigStore.js";
import { enabledServices, hasCredential } from "../ServiceRegistry.js";
import { mark } from "../Utils.js";

/** Timeouts below this many seconds are reported. */
export const MINIMUM_SAFE_TIMEOUT_SECONDS = 5;

function missingCredential(snapshot: ConfigSnapshot, name: ProviderName): ValidationIssue | undefined {
  const spec = snapshot.providers[name];
  if (!spec.enabled || hasCredential(spec)) {
    return undefined;
  }
  return {
    kind: "missing_credential",
    provider: name,
    message: `${credentialVariable(name)} missing but ${name} is enabled`,
  };
}

/**
 * Runs every configuration check against the snapshot and collects the
 * findings. Checks are independent; the report lists them in check order.
 * Never throws and never logs; callers decide whether to degrade or exit.
 */
export function validateConfig(snapshot: ConfigSnapshot): ValidationReport {
  const issues: ValidationIssue[] = [];

  for (const name of TEXT_PROVIDERS) {
    const issue = missingCredential(snapshot, name);
    if (issue) issues.push(issue);
  }

  if (TEXT_PROVIDERS.every((name) => !snapshot.providers[name].enabled)) {
    issues.push({ kind: "no_text_provider", message: "No text-generation provider enabled" });
  }

  for (const name of IMAGE_PROVIDERS) {
    const issue = missingCredential(snapshot, name);
    if (issue) issues.push(issue);
  }

  // Reported only; the configured value is still used.
  if (snapshot.timeoutSeconds < MINIMUM_SAFE_TIMEOUT_SECONDS) {
    issues.push({
      kind: "unsafe_timeout",
      message: `LLM_TIMEOUT too low (minimum ${MINIMUM_SAFE_TIMEOUT_SECONDS} seconds)`,
    });
  }

  return { issues, overallPass: issues.length === 0 };
}

/**
 * Logs the configuration status at startup.
 */
export function logConfigStatus(snapshot: ConfigSnapshot, report: ValidationReport, log: Logger): void {
  log.info("=== Configuration Status ===");
  for (const spec of Object.values(snapshot.providers)) {
    log.info(`${spec.name} enabled: ${spec.enabled}, API key: ${mark(hasCredential(spec))}`);
  }
  log.info(`LLM timeout: ${snapshot.timeoutSeconds}s, max retries: ${snapshot.maxRetries}`);
  log.info(`Database path: ${snapshot.storagePath}`);
  log.info(`Enabled services: [${enabledServices(snapshot).join(", ")}]`);

  if (snapshot.allowedOrigins.includes(WILDCARD_ORIGIN)) {
    log.warn("Development mode: CORS accepts requests from any origin");
  }

  if (report.overallPass) {
    log.info("Configuration valid");
  } else {
    for (const issue of report.issues) {
      log.warn({ kind: issue.kind, provider: issue.provider }, `Configuration issue: ${issue.message}`);
    }
  }
}
