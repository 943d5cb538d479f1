export * from './types.js';
export * from './errors.js';
export { DEFAULT_SYSTEM_MESSAGE, loadFewShotExamples, resolveOptions, type RerankOptions, type RerankOptionsInput } from './options.js';
export {
	approximateTokenCounter,
	countMessageTokens,
	createApproximateTokenCounter,
	createTiktokenCounter,
	encodingForModelName,
	type TokenCounter
} from './tokens.js';
export { MIN_TOKENS_PER_LABEL, PromptBuilder, labelFor, passageText, type PromptBuilderOptions } from './prompt.js';
export { parsePermutation } from './parser.js';
export { completePermutation, identityPermutation, isPermutation, repairPermutation, type RepairPolicy } from './repair.js';
export { applyFold, planWindows, windowsAreDisjoint, type PlannedSpan, type WindowPlanOptions } from './windows.js';
export { calculateBackoffDelay, sleep, withDeadline, type Sleep } from './backoff.js';
export { createRandom, shuffleSpan } from './shuffle.js';
export { SlidingWindowScheduler, type SchedulerDeps, type SchedulerOptions, type SchedulerRun, type SchedulerState } from './scheduler.js';
export { RerankEngine, toCandidates, toRanked, validateRerankInput, type RerankEngineDeps } from './engine.js';
export { IdentityReranker, getReranker, windowDefaults } from './reranker.js';
export {
	OpenAIModelClient,
	classifyBackendError,
	createOpenAIModelClient,
	createProxyAgent,
	DEFAULT_BASE_URLS,
	type ChatCompletionsApi,
	type ChatCompletionReply,
	type ChatCompletionRequest,
	type OpenAIBackend,
	type OpenAIModelClientConfig
} from './clients/openai.js';
export { logFilePath, logRerankRun, type RerankLogEntry } from './logger.js';
