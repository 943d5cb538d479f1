import { describe, it, expect } from 'vitest';
import { loadConfig, ConfigurationError } from './index.js';

describe('loadConfig', () => {
	it('should apply defaults when only the API key is set', () => {
		const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });

		expect(config.reranker).toEqual({
			provider: 'openai',
			model: 'gpt-4o-mini',
			apiKeys: ['test-secret'],
			keyStart: 0,
			baseUrl: undefined,
			proxy: undefined,
			openrouter: { siteUrl: undefined, siteName: undefined }
		});
		expect(config.window).toEqual({
			contextSize: 4096,
			windowSize: 20,
			stride: undefined,
			passes: 1,
			retryBudget: 2,
			repairThreshold: 20,
			direction: 'forward',
			timeoutMs: 30000,
			concurrency: 1,
			topK: undefined,
			shuffle: false,
			seed: 0,
			recordInvocations: false
		});
		expect(config.prompt).toEqual({ style: 'single-turn', systemMessage: undefined, fewShotFile: undefined });
		expect(config.typesense.protocol).toBe('http');
		expect(config.typesense.collection).toBe('docs_chunks');
	});

	it('should parse numeric window settings', () => {
		const config = loadConfig({
			RERANK_PROVIDER: 'local',
			RERANK_WINDOW_SIZE: '10',
			RERANK_STRIDE: '5',
			RERANK_PASSES: '3',
			RERANK_DIRECTION: 'backward',
			TYPESENSE_PORT: '8108'
		});

		expect(config.reranker.provider).toBe('local');
		expect(config.window.windowSize).toBe(10);
		expect(config.window.stride).toBe(5);
		expect(config.window.passes).toBe(3);
		expect(config.window.direction).toBe('backward');
		expect(config.typesense.port).toBe(8108);
	});

	it('should not require an API key for the identity provider', () => {
		const config = loadConfig({ RERANK_PROVIDER: 'identity' });

		expect(config.reranker.provider).toBe('identity');
		expect(config.reranker.apiKeys).toEqual([]);
	});

	it('should require an API key for hosted providers', () => {
		expect(() => loadConfig({ RERANK_PROVIDER: 'openrouter' })).toThrow(ConfigurationError);
	});

	it('should split a comma-separated key list', () => {
		const config = loadConfig({ OPENAI_API_KEY: 'test-secret-1, test-secret-2,', RERANK_KEY_START: '1' });

		expect(config.reranker.apiKeys).toEqual(['test-secret-1', 'test-secret-2']);
		expect(config.reranker.keyStart).toBe(1);
	});

	it('should reject a key start past the last key', () => {
		expect(() => loadConfig({ OPENAI_API_KEY: 'test-secret', RERANK_KEY_START: '1' })).toThrow(
			'RERANK_KEY_START must be below the number of OPENAI_API_KEY entries (1)'
		);
	});

	it('should treat a blank key list as missing', () => {
		expect(() => loadConfig({ OPENAI_API_KEY: ' , ' })).toThrow(
			'OPENAI_API_KEY is required when RERANK_PROVIDER is "openai"'
		);
	});

	it('should parse the proxy URL', () => {
		const config = loadConfig({ RERANK_PROVIDER: 'local', RERANK_PROXY: 'http://proxy.internal:3128' });
		expect(config.reranker.proxy).toBe('http://proxy.internal:3128');
	});

	it('should parse prompt settings', () => {
		const config = loadConfig({
			RERANK_PROVIDER: 'local',
			RERANK_PROMPT_STYLE: 'multi-turn',
			RERANK_SYSTEM_MESSAGE: 'You rank passages.',
			RERANK_FEW_SHOT_FILE: 'fixtures/few-shot.json'
		});

		expect(config.prompt).toEqual({
			style: 'multi-turn',
			systemMessage: 'You rank passages.',
			fewShotFile: 'fixtures/few-shot.json'
		});
	});

	it('should parse shuffle, seed, top-k and invocation recording', () => {
		const config = loadConfig({
			RERANK_PROVIDER: 'local',
			RERANK_SHUFFLE: 'true',
			RERANK_SEED: '42',
			RERANK_TOP_K: '50',
			RERANK_RECORD_INVOCATIONS: 'true'
		});

		expect(config.window).toMatchObject({ shuffle: true, seed: 42, topK: 50, recordInvocations: true });
	});

	it('should reject invalid flags and a zero top-k', () => {
		try {
			loadConfig({ RERANK_PROVIDER: 'local', RERANK_SHUFFLE: 'yes', RERANK_TOP_K: '0', RERANK_PROMPT_STYLE: 'chat' });
			expect.unreachable('loadConfig should have thrown');
		} catch (error) {
			const issues = error instanceof ConfigurationError ? error.issues : [];
			expect(issues).toEqual([
				'  - RERANK_TOP_K: RERANK_TOP_K must be a positive integer',
				'  - RERANK_SHUFFLE: RERANK_SHUFFLE must be either "true" or "false"',
				'  - RERANK_PROMPT_STYLE: RERANK_PROMPT_STYLE must be either "single-turn" or "multi-turn"'
			]);
		}
	});

	it('should list every invalid variable', () => {
		try {
			loadConfig({
				OPENAI_API_KEY: 'test-secret',
				RERANK_WINDOW_SIZE: 'twenty',
				RERANK_DIRECTION: 'sideways'
			});
			expect.unreachable('loadConfig should have thrown');
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigurationError);
			const issues = error instanceof ConfigurationError ? error.issues : [];
			expect(issues).toHaveLength(2);
			expect(issues).toContain('  - RERANK_WINDOW_SIZE: RERANK_WINDOW_SIZE must be a non-negative integer');
			expect(issues).toContain('  - RERANK_DIRECTION: RERANK_DIRECTION must be either "forward" or "backward"');
		}
	});
});
