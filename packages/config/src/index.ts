import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

// This file is in packages/config/src, so the project root is 3 levels up
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const projectRoot = resolve(__dirname, '../../../');

/**
 * Supported reranker backends
 */
export const RERANK_PROVIDERS = ['openai', 'openrouter', 'local', 'identity', 'none'] as const;

export type RerankProvider = (typeof RERANK_PROVIDERS)[number];

const integer = (name: string, fallback: string) =>
	z
		.string()
		.regex(/^\d+$/, `${name} must be a non-negative integer`)
		.default(fallback)
		.transform(Number);

const flag = (name: string) =>
	z
		.enum(['true', 'false'], {
			errorMap: () => ({ message: `${name} must be either "true" or "false"` })
		})
		.default('false')
		.transform((value) => value === 'true');

/**
 * Environment variable schema validation
 */
const envSchema = z
	.object({
		// Reranker backend
		RERANK_PROVIDER: z.enum(RERANK_PROVIDERS, {
			errorMap: () => ({ message: `RERANK_PROVIDER must be one of: ${RERANK_PROVIDERS.join(', ')}` })
		}).default('openai'),
		RERANK_MODEL: z.string().min(1, 'RERANK_MODEL must not be empty').default('gpt-4o-mini'),
		// Comma-separated; rate limits rotate through the keys
		OPENAI_API_KEY: z
			.string()
			.min(1, 'OPENAI_API_KEY must not be empty')
			.transform((value) => value.split(',').map((key) => key.trim()).filter(Boolean))
			.optional(),
		RERANK_KEY_START: integer('RERANK_KEY_START', '0'),
		RERANK_BASE_URL: z.string().url('RERANK_BASE_URL must be a valid URL').optional(),
		RERANK_PROXY: z.string().url('RERANK_PROXY must be a valid URL').optional(),
		OPENROUTER_SITE_URL: z.string().url('OPENROUTER_SITE_URL must be a valid URL').optional(),
		OPENROUTER_SITE_NAME: z.string().min(1).optional(),

		// Sliding window
		RERANK_CONTEXT_SIZE: integer('RERANK_CONTEXT_SIZE', '4096'),
		RERANK_WINDOW_SIZE: integer('RERANK_WINDOW_SIZE', '20'),
		RERANK_STRIDE: z
			.string()
			.regex(/^\d+$/, 'RERANK_STRIDE must be a non-negative integer')
			.transform(Number)
			.optional(),
		RERANK_PASSES: integer('RERANK_PASSES', '1'),
		RERANK_RETRY_BUDGET: integer('RERANK_RETRY_BUDGET', '2'),
		RERANK_REPAIR_THRESHOLD: integer('RERANK_REPAIR_THRESHOLD', '20'),
		RERANK_DIRECTION: z.enum(['forward', 'backward'], {
			errorMap: () => ({ message: 'RERANK_DIRECTION must be either "forward" or "backward"' })
		}).default('forward'),
		RERANK_TIMEOUT_MS: integer('RERANK_TIMEOUT_MS', '30000'),
		RERANK_CONCURRENCY: integer('RERANK_CONCURRENCY', '1'),
		// Only the first K candidates are reranked; the rest keep their order
		RERANK_TOP_K: z
			.string()
			.regex(/^[1-9]\d*$/, 'RERANK_TOP_K must be a positive integer')
			.transform(Number)
			.optional(),
		RERANK_SHUFFLE: flag('RERANK_SHUFFLE'),
		RERANK_SEED: integer('RERANK_SEED', '0'),
		RERANK_RECORD_INVOCATIONS: flag('RERANK_RECORD_INVOCATIONS'),

		// Prompt
		RERANK_PROMPT_STYLE: z.enum(['single-turn', 'multi-turn'], {
			errorMap: () => ({ message: 'RERANK_PROMPT_STYLE must be either "single-turn" or "multi-turn"' })
		}).default('single-turn'),
		RERANK_SYSTEM_MESSAGE: z.string().min(1, 'RERANK_SYSTEM_MESSAGE must not be empty').optional(),
		RERANK_FEW_SHOT_FILE: z.string().min(1, 'RERANK_FEW_SHOT_FILE must not be empty').optional(),

		// Typesense configuration (retrieval stage only)
		TYPESENSE_HOST: z.string().min(1, 'TYPESENSE_HOST must not be empty').optional(),
		TYPESENSE_PORT: z
			.string()
			.regex(/^\d+$/, 'TYPESENSE_PORT must be a valid number')
			.transform(Number)
			.optional(),
		TYPESENSE_PROTOCOL: z.enum(['http', 'https'], {
			errorMap: () => ({ message: 'TYPESENSE_PROTOCOL must be either "http" or "https"' })
		}).default('http'),
		TYPESENSE_API_KEY: z.string().min(1, 'TYPESENSE_API_KEY must not be empty').optional(),
		TYPESENSE_COLLECTION: z.string().min(1).default('docs_chunks')
	})
	.superRefine((env, ctx) => {
		const keys = env.OPENAI_API_KEY ?? [];
		if ((env.RERANK_PROVIDER === 'openai' || env.RERANK_PROVIDER === 'openrouter') && keys.length === 0) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['OPENAI_API_KEY'],
				message: `OPENAI_API_KEY is required when RERANK_PROVIDER is "${env.RERANK_PROVIDER}"`
			});
		}
		if (keys.length > 0 && env.RERANK_KEY_START >= keys.length) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['RERANK_KEY_START'],
				message: `RERANK_KEY_START must be below the number of OPENAI_API_KEY entries (${keys.length})`
			});
		}
	});

/**
 * Validated configuration object
 */
export type Config = {
	reranker: {
		provider: RerankProvider;
		model: string;
		apiKeys: string[];
		keyStart: number;
		baseUrl?: string;
		proxy?: string;
		openrouter: {
			siteUrl?: string;
			siteName?: string;
		};
	};
	window: {
		contextSize: number;
		windowSize: number;
		/** Unset means half the window */
		stride?: number;
		passes: number;
		retryBudget: number;
		repairThreshold: number;
		direction: 'forward' | 'backward';
		timeoutMs: number;
		concurrency: number;
		/** Unset means the whole list */
		topK?: number;
		shuffle: boolean;
		seed: number;
		recordInvocations: boolean;
	};
	prompt: {
		style: 'single-turn' | 'multi-turn';
		/** Unset keeps the built-in judge instructions */
		systemMessage?: string;
		/** JSON array of { query, passages, answer } */
		fewShotFile?: string;
	};
	typesense: {
		host?: string;
		port?: number;
		protocol: 'http' | 'https';
		apiKey?: string;
		collection: string;
	};
};

/**
 * Raised when environment variables are missing or invalid
 */
export class ConfigurationError extends Error {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(message);
		this.name = 'ConfigurationError';
		this.issues = issues;
	}
}

/**
 * Validates and parses environment variables, then returns a typed config object.
 * Fails with every invalid variable listed, not just the first one.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): Config {
	const result = envSchema.safeParse(source);

	if (!result.success) {
		const issues = result.error.errors.map((err) => `  - ${err.path.join('.')}: ${err.message}`);
		const errorMessage = [
			'Configuration validation failed. Missing or invalid environment variables:',
			...issues,
			'',
			'Please ensure all required environment variables are set correctly.'
		].join('\n');

		throw new ConfigurationError(errorMessage, issues);
	}

	const env = result.data;

	return {
		reranker: {
			provider: env.RERANK_PROVIDER,
			model: env.RERANK_MODEL,
			apiKeys: env.OPENAI_API_KEY ?? [],
			keyStart: env.RERANK_KEY_START,
			baseUrl: env.RERANK_BASE_URL,
			proxy: env.RERANK_PROXY,
			openrouter: {
				siteUrl: env.OPENROUTER_SITE_URL,
				siteName: env.OPENROUTER_SITE_NAME
			}
		},
		window: {
			contextSize: env.RERANK_CONTEXT_SIZE,
			windowSize: env.RERANK_WINDOW_SIZE,
			stride: env.RERANK_STRIDE,
			passes: env.RERANK_PASSES,
			retryBudget: env.RERANK_RETRY_BUDGET,
			repairThreshold: env.RERANK_REPAIR_THRESHOLD,
			direction: env.RERANK_DIRECTION,
			timeoutMs: env.RERANK_TIMEOUT_MS,
			concurrency: env.RERANK_CONCURRENCY,
			topK: env.RERANK_TOP_K,
			shuffle: env.RERANK_SHUFFLE,
			seed: env.RERANK_SEED,
			recordInvocations: env.RERANK_RECORD_INVOCATIONS
		},
		prompt: {
			style: env.RERANK_PROMPT_STYLE,
			systemMessage: env.RERANK_SYSTEM_MESSAGE,
			fewShotFile: env.RERANK_FEW_SHOT_FILE
		},
		typesense: {
			host: env.TYPESENSE_HOST,
			port: env.TYPESENSE_PORT,
			protocol: env.TYPESENSE_PROTOCOL,
			apiKey: env.TYPESENSE_API_KEY,
			collection: env.TYPESENSE_COLLECTION
		}
	};
}

let cachedConfig: Config | null = null;

/**
 * Loads .env from the project root on first use and returns the validated config.
 */
export function getConfig(): Config {
	if (cachedConfig) {
		return cachedConfig;
	}

	dotenvConfig({ path: resolve(projectRoot, '.env') });

	try {
		cachedConfig = loadConfig(process.env);
		return cachedConfig;
	} catch (error) {
		if (error instanceof ConfigurationError) {
			console.error(error.message);
		}
		throw error;
	}
}
