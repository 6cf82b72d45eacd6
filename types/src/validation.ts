import type { ProviderName } from './provider.js';

export type ValidationIssueKind = 'missing_credential' | 'no_text_provider' | 'unsafe_timeout';

export type ValidationIssue = {
  kind: ValidationIssueKind;
  /** Set for issues about a single provider. */
  provider?: ProviderName;
  message: string;
};

/**
 * Outcome of one validation run. `overallPass` is true iff `issues` is empty.
 */
export type ValidationReport = {
  issues: readonly ValidationIssue[];
  overallPass: boolean;
};
