import { generateText, type LanguageModel } from "ai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import type { ConfigSnapshot } from "#types/appConfig";
import { TEXT_PROVIDERS, type TextProviderName } from "#types/provider";
import { isProviderUsable, type CredentialedProviderSpec } from "./ServiceRegistry.js";
import { logger } from "./Logger.js";
import { getErrorMessage } from "./Utils.js";

/** Builds a model handle for one provider from its API key. */
export type ModelFactory = (apiKey: string) => (modelId: string) => LanguageModel;

export type GenerateRequest = {
  model: LanguageModel;
  prompt: string;
  maxRetries: number;
  abortSignal: AbortSignal;
};

/** The call that actually talks to a provider. */
export type GenerateFunction = (request: GenerateRequest) => Promise<{ text: string }>;

export type TextGenerationInput = {
  prompt: string;
  /** Restrict dispatch to one provider. Defaults to every usable provider in priority order. */
  provider?: string;
};

export type TextGenerationResult = {
  text: string;
  provider: TextProviderName;
  model: string;
  processingTimeMs: number;
};

export type TextGenerationError = { error: string; status: number };

export type ProviderCheck =
  | { provider: TextProviderName; ok: true; workingModel: string }
  | { provider: TextProviderName; ok: false; error: string };

type Candidate = { name: TextProviderName; spec: CredentialedProviderSpec };

const CHECK_PROMPT = "Hi";

type TextGenerationServiceOptions = {
  modelFactories?: Partial<Record<TextProviderName, ModelFactory>>;
  generate?: GenerateFunction;
};

// Adding a text provider means adding its factory here.
const MODEL_FACTORIES: Record<TextProviderName, ModelFactory> = {
  claude: (apiKey) => createAnthropic({ apiKey }),
  gemini: (apiKey) => createGoogleGenerativeAI({ apiKey }),
};

const isTextProvider = (name: string): name is TextProviderName =>
  TEXT_PROVIDERS.some((candidate) => candidate === name);

/**
 * Dispatches prompts to the usable text-generation providers.
 *
 * Providers are tried in priority order, and within a provider each model of
 * its priority list in turn; the first successful answer wins.
 */
export class TextGenerationService {
  private readonly modelFactories: Record<TextProviderName, ModelFactory>;
  private readonly generateFn: GenerateFunction;
  private providerInstances: Map<TextProviderName, (modelId: string) => LanguageModel> = new Map();

  constructor(
    private readonly snapshot: ConfigSnapshot,
    options: TextGenerationServiceOptions = {},
  ) {
    this.modelFactories = { ...MODEL_FACTORIES, ...options.modelFactories };
    this.generateFn = options.generate ?? ((request) => generateText(request));
  }

  /**
   * Gets or creates the provider client, with caching.
   */
  private getOrCreateProvider(name: TextProviderName, apiKey: string): (modelId: string) => LanguageModel {
    let instance = this.providerInstances.get(name);
    if (!instance) {
      instance = this.modelFactories[name](apiKey);
      this.providerInstances.set(name, instance);
    }
    return instance;
  }

  private usableCandidates(): Candidate[] {
    return TEXT_PROVIDERS.flatMap((name) => {
      const spec = this.snapshot.providers[name];
      return isProviderUsable(spec) ? [{ name, spec }] : [];
    });
  }

  private selectCandidates(requested: string | undefined): Candidate[] | TextGenerationError {
    const usable = this.usableCandidates();

    if (requested === undefined) {
      if (usable.length === 0) {
        logger.warn("No text-generation provider available");
        return { error: "No text-generation provider available", status: 503 };
      }
      return usable;
    }

    if (!isTextProvider(requested)) {
      return { error: `Unknown text-generation provider: ${requested}`, status: 400 };
    }
    const match = usable.filter((candidate) => candidate.name === requested);
    if (match.length === 0) {
      return { error: `Provider '${requested}' is not available`, status: 503 };
    }
    return match;
  }

  private async attempt(candidate: Candidate, modelId: string, prompt: string): Promise<string> {
    const provider = this.getOrCreateProvider(candidate.name, candidate.spec.credential);
    const { text } = await this.generateFn({
      model: provider(modelId),
      prompt,
      maxRetries: this.snapshot.maxRetries,
      abortSignal: AbortSignal.timeout(this.snapshot.timeoutSeconds * 1000),
    });
    return text;
  }

  public async generate(
    input: TextGenerationInput,
  ): Promise<TextGenerationResult | TextGenerationError> {
    const candidates = this.selectCandidates(input.provider);
    if ("error" in candidates) {
      return candidates;
    }

    let lastError = "No model attempted";
    for (const candidate of candidates) {
      for (const modelId of candidate.spec.modelPriorityList) {
        const startTime = Date.now();
        try {
          const text = await this.attempt(candidate, modelId, input.prompt);
          const processingTimeMs = Date.now() - startTime;
          logger.debug(`Generated text with '${candidate.name}' @ '${modelId}' in ${processingTimeMs}ms`);
          return { text, provider: candidate.name, model: modelId, processingTimeMs };
        } catch (error) {
          lastError = getErrorMessage(error);
          logger.warn(`Model '${modelId}' of '${candidate.name}' failed: ${lastError}`);
        }
      }
    }

    logger.error(`All text-generation providers failed. Last error: ${lastError}`);
    return { error: `Text generation failed: ${lastError}`, status: 502 };
  }

  /**
   * Makes a minimal live call to every usable text provider, walking its
   * model list until one answers. Providers are checked independently.
   */
  public async checkProviders(): Promise<ProviderCheck[]> {
    const checks: ProviderCheck[] = [];
    for (const candidate of this.usableCandidates()) {
      let lastError = "No model attempted";
      let workingModel: string | undefined;
      for (const modelId of candidate.spec.modelPriorityList) {
        try {
          await this.attempt(candidate, modelId, CHECK_PROMPT);
          workingModel = modelId;
          break;
        } catch (error) {
          lastError = getErrorMessage(error);
          logger.warn(`Health check of '${candidate.name}' @ '${modelId}' failed: ${lastError}`);
        }
      }
      checks.push(
        workingModel === undefined
          ? { provider: candidate.name, ok: false, error: lastError }
          : { provider: candidate.name, ok: true, workingModel },
      );
    }
    return checks;
  }

  /**
   * Clears the provider instance cache.
   */
  public clearCache(): void {
    this.providerInstances.clear();
  }
}
