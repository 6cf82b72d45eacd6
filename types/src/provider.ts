/**
 * Provider identifiers, grouped by the kind of content they generate.
 * The order of each list is the dispatch priority.
 */
export const TEXT_PROVIDERS = ["claude", "gemini"] as const;
export const IMAGE_PROVIDERS = ["stability_ai"] as const;

export type TextProviderName = (typeof TEXT_PROVIDERS)[number];
export type ImageProviderName = (typeof IMAGE_PROVIDERS)[number];
export type ProviderName = TextProviderName | ImageProviderName;

export type ProviderCategory = "text" | "image";

/**
 * Type definition for a single integration as read from the environment.
 */
export type ProviderSpec = {
  name: ProviderName;

  category: ProviderCategory;

  /** The API key. Undefined when unset or blank. */
  credential?: string;

  /** Feature flag. A provider is only dispatched to when this is true and a credential is present. */
  enabled: boolean;

  /** Model identifiers in fallback order, most preferred first. Never empty. */
  modelPriorityList: readonly string[];
};

/**
 * Public view of a provider, safe to serialize. Carries no secrets.
 */
export type ProviderStatus = {
  category: ProviderCategory;
  enabled: boolean;
  credentialConfigured: boolean;
  usable: boolean;
  models: readonly string[];
};
