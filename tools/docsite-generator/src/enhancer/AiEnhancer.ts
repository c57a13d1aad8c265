import { getLog, logError } from "../shared/logger";
import { type ModelSpec, parseModelSpec } from "./ModelSpec";
import { buildEnhancementPrompt } from "./Prompts";
import { unwrapMarkdownReply } from "docsite-common";

const log = getLog(import.meta);

export interface CompletionRequest {
	provider: ModelSpec["provider"];
	model: string;
	prompt: string;
	temperature: number;
	maxTokens: number;
}

/**
 * Sends a prompt to a language model. Implementations own the network client and
 * credentials; a reply of `undefined` or an empty string means no enhancement.
 */
export interface CompletionProvider {
	complete(request: CompletionRequest): Promise<string | undefined>;
}

export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_TOKENS = 4096;

/**
 * Rewrites generated section content through a completion provider. Any failure leaves
 * the original content in place.
 */
export class AiEnhancer {
	readonly spec: ModelSpec;
	private readonly provider: CompletionProvider;

	constructor(provider: CompletionProvider, model: string) {
		this.provider = provider;
		this.spec = parseModelSpec(model, log);
		log.info(`Initialized AI enhancer with ${this.spec.provider}/${this.spec.model}`);
	}

	/**
	 * Sends a ready-made prompt and returns the trimmed reply, or undefined when the provider
	 * fails or replies with nothing.
	 *
	 * @param task names the request in log messages
	 */
	async complete(prompt: string, task: string): Promise<string | undefined> {
		log.info(`Enhancing ${task} content with AI`);
		try {
			const reply = await this.provider.complete({
				provider: this.spec.provider,
				model: this.spec.model,
				prompt,
				temperature: DEFAULT_TEMPERATURE,
				maxTokens: DEFAULT_MAX_TOKENS,
			});
			return reply?.trim() || undefined;
		} catch (error) {
			logError(log, error, `AI enhancement of ${task} failed`);
			return;
		}
	}

	async enhance(content: string, section: string): Promise<string> {
		const reply = await this.complete(buildEnhancementPrompt(content, section), section);
		if (!reply) {
			log.warn(`AI enhancement failed. Using original content for ${section}.`);
			return content;
		}
		return unwrapMarkdownReply(reply);
	}
}
