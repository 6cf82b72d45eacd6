import lodash from "lodash";
import type { ConfigSnapshot } from "#types/appConfig";
import {
  IMAGE_PROVIDERS,
  TEXT_PROVIDERS,
  type ProviderName,
  type ProviderSpec,
  type ProviderStatus,
  type TextProviderName,
} from "#types/provider";

export type CredentialedProviderSpec = ProviderSpec & { credential: string };

/**
 * True when the provider has a non-empty credential. The one definition of
 * "credential present" used by validation, status and dispatch.
 */
export const hasCredential = (spec: ProviderSpec): spec is CredentialedProviderSpec =>
  spec.credential !== undefined && spec.credential.length > 0;

/**
 * A provider is usable only when its flag is on and it has a credential.
 */
export const isProviderUsable = (spec: ProviderSpec): spec is CredentialedProviderSpec =>
  spec.enabled && hasCredential(spec);

/**
 * Usable text-generation providers, in dispatch priority order.
 */
export function enabledTextProviders(snapshot: ConfigSnapshot): TextProviderName[] {
  return TEXT_PROVIDERS.filter((name) => isProviderUsable(snapshot.providers[name]));
}

/**
 * Usable providers across every category: text providers first, then image.
 */
export function enabledServices(snapshot: ConfigSnapshot): ProviderName[] {
  const imageProviders = IMAGE_PROVIDERS.filter((name) => isProviderUsable(snapshot.providers[name]));
  return [...enabledTextProviders(snapshot), ...imageProviders];
}

/**
 * True when no text provider can be dispatched to. The application keeps
 * running but text generation answers 503.
 */
export const isDegraded = (snapshot: ConfigSnapshot): boolean => enabledTextProviders(snapshot).length === 0;

/**
 * Serializable status of every provider. Credentials are reduced to a presence flag.
 */
export function getProviderStatus(snapshot: ConfigSnapshot): Record<ProviderName, ProviderStatus> {
  return lodash.mapValues(snapshot.providers, (spec) => ({
    category: spec.category,
    enabled: spec.enabled,
    credentialConfigured: hasCredential(spec),
    usable: isProviderUsable(spec),
    models: spec.modelPriorityList,
  }));
}
