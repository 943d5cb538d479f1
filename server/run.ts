/**
 * Search API server
 *
 * Usage: npx tsx server/run.ts
 *
 * Serves /api/search (Typesense retrieval + listwise rerank) and /api/rerank
 * on PORT (default 3000).
 */

import { serve } from '@hono/node-server';
import { getConfig } from '@listwise/config';
import { getReranker } from '@listwise/rerank';
import { TypesenseRetriever, getTypesenseClient, typesenseSearchApi } from '../pipeline/retrieve/typesense.js';
import { createSearchApp } from './app.js';

const PORT = parseInt(process.env.PORT || '3000', 10);

function main() {
	const config = getConfig();

	const { host, apiKey } = config.typesense;
	const retriever =
		host && apiKey ? new TypesenseRetriever(typesenseSearchApi(getTypesenseClient(config.typesense)), config.typesense) : null;
	if (!retriever) {
		console.warn('⚠️  TYPESENSE_HOST/TYPESENSE_API_KEY not set; /api/search is unavailable');
	}

	const reranker = getReranker(config);
	if (!reranker) {
		console.warn('⚠️  Reranking is disabled (RERANK_PROVIDER=none)');
	}

	const app = createSearchApp({ retriever, reranker });
	serve({ fetch: app.fetch, port: PORT }, (info) => {
		console.log(`Search API listening on http://localhost:${info.port}`);
		console.log(`Reranker: ${reranker?.name ?? 'none'}`);
	});
}

try {
	main();
} catch (error) {
	console.error('Fatal error:', error);
	process.exit(1);
}
