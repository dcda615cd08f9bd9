import type { SearchIndexResult, SearchIndexer } from '@contentreview/core';
import type { Queryable } from '../connection';

export interface SearchStoreOptions {
  /** Base of the URL handed back for an indexed document. */
  publicBaseUrl: string;
}

export interface SearchHit {
  contentItemId: string;
  collectionId: string;
  rank: number;
}

export interface SearchStore extends SearchIndexer {
  search(collectionId: string, text: string, limit?: number): Promise<SearchHit[]>;
}

export function documentUrl(publicBaseUrl: string, contentItemId: string): string {
  return `${publicBaseUrl.replace(/\/+$/, '')}/documents/${encodeURIComponent(contentItemId)}`;
}

export function createSearchStore(pool: Queryable, options: SearchStoreOptions): SearchStore {
  return {
    async index(
      contentItemId: string,
      topics: string[],
      entities: string[],
      collectionId: string
    ): Promise<SearchIndexResult> {
      const text = [...topics, ...entities].join(' ');

      await pool.query(
        `INSERT INTO search_documents (content_item_id, collection_id, topics, entities, document)
         VALUES ($1, $2, $3, $4, to_tsvector('simple', $5))
         ON CONFLICT (content_item_id) DO UPDATE
         SET collection_id = EXCLUDED.collection_id,
             topics = EXCLUDED.topics,
             entities = EXCLUDED.entities,
             document = EXCLUDED.document,
             indexed_at = NOW()`,
        [contentItemId, collectionId, topics, entities, text]
      );

      return { success: true, externalUrl: documentUrl(options.publicBaseUrl, contentItemId) };
    },

    async search(collectionId: string, text: string, limit = 20): Promise<SearchHit[]> {
      const result = await pool.query<{
        content_item_id: string;
        collection_id: string;
        rank: number;
      }>(
        `SELECT content_item_id, collection_id,
                ts_rank(document, plainto_tsquery('simple', $2))::float8 AS rank
         FROM search_documents
         WHERE collection_id = $1 AND document @@ plainto_tsquery('simple', $2)
         ORDER BY rank DESC
         LIMIT $3`,
        [collectionId, text, limit]
      );

      return result.rows.map((row) => ({
        contentItemId: row.content_item_id,
        collectionId: row.collection_id,
        rank: row.rank,
      }));
    },
  };
}
