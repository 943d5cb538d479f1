/**
 * Typesense keyword retriever
 *
 * First-stage retrieval for the pipeline: runs a keyword search against an
 * existing docs collection and returns deduplicated candidates in search order.
 */

import { Client as TypesenseClient } from 'typesense';
import { z } from 'zod';
import type { Config } from '@listwise/config';
import type { CandidateInput, Retriever } from '@listwise/rerank';

/**
 * Fields read from an indexed chunk
 */
const chunkDocumentSchema = z.object({
	id: z.string().min(1),
	content: z.string(),
	title: z.string().optional(),
	section_path: z.string().optional()
});

export type TypesenseHit = {
	document: unknown;
	text_match?: number;
};

export type KeywordSearchParams = {
	q: string;
	query_by: string;
	per_page: number;
};

/**
 * The slice of the Typesense client the retriever needs
 */
export interface KeywordSearchApi {
	search(collection: string, params: KeywordSearchParams): Promise<{ hits?: TypesenseHit[] }>;
}

/**
 * Maps a search hit to a rerank candidate, or null when the document lacks an id or content
 */
export function hitToCandidate(hit: TypesenseHit): CandidateInput | null {
	const parsed = chunkDocumentSchema.safeParse(hit.document);
	if (!parsed.success) {
		return null;
	}

	const doc = parsed.data;
	const title = [doc.title, doc.section_path]
		.filter((part): part is string => Boolean(part))
		.filter((part, i, parts) => parts.indexOf(part) === i)
		.join(' > ');

	return {
		id: doc.id,
		text: doc.content,
		...(title ? { title } : {}),
		...(hit.text_match !== undefined ? { score: hit.text_match } : {})
	};
}

/**
 * Keeps the first occurrence of each id and drops unusable hits
 */
export function hitsToCandidates(hits: TypesenseHit[]): CandidateInput[] {
	const seen = new Set<string>();
	const candidates: CandidateInput[] = [];

	for (const hit of hits) {
		const candidate = hitToCandidate(hit);
		if (!candidate || seen.has(candidate.id)) {
			continue;
		}
		seen.add(candidate.id);
		candidates.push(candidate);
	}

	return candidates;
}

function httpStatusOf(error: unknown): number | undefined {
	if (typeof error === 'object' && error !== null && 'httpStatus' in error && typeof error.httpStatus === 'number') {
		return error.httpStatus;
	}
	return undefined;
}

/**
 * Typesense client instance (singleton pattern)
 */
let clientInstance: TypesenseClient | null = null;

/**
 * Gets or creates a Typesense client from configuration
 *
 * @throws {Error} If host or API key is missing
 */
export function getTypesenseClient(settings: Config['typesense']): TypesenseClient {
	if (clientInstance) {
		return clientInstance;
	}

	const { host, port, protocol, apiKey } = settings;
	if (!host || !apiKey) {
		throw new Error('TYPESENSE_HOST and TYPESENSE_API_KEY must be set to run the retrieval stage.');
	}

	clientInstance = new TypesenseClient({
		nodes: [
			{
				host,
				port: port ?? (protocol === 'https' ? 443 : 8108),
				protocol
			}
		],
		apiKey,
		connectionTimeoutSeconds: 10,
		numRetries: 3,
		retryIntervalSeconds: 0.1
	});

	return clientInstance;
}

export function typesenseSearchApi(client: TypesenseClient): KeywordSearchApi {
	return {
		search: (collection, params) => client.collections(collection).documents().search(params)
	};
}

export class TypesenseRetriever implements Retriever {
	private readonly api: KeywordSearchApi;
	private readonly settings: Config['typesense'];

	constructor(api: KeywordSearchApi, settings: Config['typesense']) {
		this.api = api;
		this.settings = settings;
	}

	/**
	 * Keyword search over content, title and section path
	 */
	async retrieve(query: string, limit: number): Promise<CandidateInput[]> {
		const { collection } = this.settings;

		try {
			const searchResults = await this.api.search(collection, {
				q: query,
				query_by: 'content,title,section_path',
				per_page: limit
			});

			return hitsToCandidates(searchResults.hits ?? []);
		} catch (error) {
			const errorMessage = error instanceof Error ? error.message : 'Unknown error';
			const httpStatus = httpStatusOf(error);

			if (httpStatus === 401 || httpStatus === 403) {
				throw new Error(
					`Authentication failed while searching: ${errorMessage}. ` + `Please check your TYPESENSE_API_KEY.`,
					{ cause: error }
				);
			}

			if (httpStatus === 404) {
				throw new Error(
					`Collection '${collection}' not found. ` + `Please ensure the collection exists and is indexed.`,
					{ cause: error }
				);
			}

			if (errorMessage.includes('ECONNREFUSED') || errorMessage.includes('ENOTFOUND')) {
				const { protocol, host, port } = this.settings;
				throw new Error(
					`Connection failed to Typesense server at ${protocol}://${host}:${port}. ` +
					`Please check that Typesense is running and TYPESENSE_HOST/TYPESENSE_PORT are correct.`,
					{ cause: error }
				);
			}

			throw new Error(`Failed to perform keyword search: ${errorMessage}`, { cause: error });
		}
	}
}
