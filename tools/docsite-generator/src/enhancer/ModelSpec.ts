import type { Logger } from "../shared/logger";

export const SUPPORTED_PROVIDERS = ["openai", "azure", "ollama"] as const;

export type ProviderName = (typeof SUPPORTED_PROVIDERS)[number];

export interface ModelSpec {
	provider: ProviderName;
	model: string;
}

const DEFAULT_PROVIDER: ProviderName = "openai";

function isSupportedProvider(name: string): name is ProviderName {
	return SUPPORTED_PROVIDERS.some(provider => provider === name);
}

/**
 * Parses a `provider/model` string. A string without exactly one slash is treated as a
 * model name for the default provider; an unknown provider also falls back to the default.
 * Both cases are logged as warnings.
 */
export function parseModelSpec(spec: string, logger?: Pick<Logger, "warn">): ModelSpec {
	const parts = spec.split("/");
	if (parts.length !== 2) {
		logger?.warn(`Invalid model format: ${spec}. Expected format: 'provider/model_name'`);
		return { provider: DEFAULT_PROVIDER, model: spec };
	}

	const [provider, model] = parts;
	if (!isSupportedProvider(provider)) {
		logger?.warn(`Unsupported provider: ${provider}. Falling back to ${DEFAULT_PROVIDER}.`);
		return { provider: DEFAULT_PROVIDER, model };
	}
	return { provider, model };
}
