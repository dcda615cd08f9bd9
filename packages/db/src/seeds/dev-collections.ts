import type { Queryable } from '../connection';

export interface SeedCollection {
  id: string;
  name: string;
  ownerId: string;
  reviewers: string[];
}

export const DEV_COLLECTIONS: SeedCollection[] = [
  {
    id: 'col-engineering',
    name: 'Engineering notes',
    ownerId: 'owner-eng',
    reviewers: ['reviewer-ana', 'reviewer-ben', 'reviewer-cho'],
  },
  {
    id: 'col-unstaffed',
    name: 'Collection without reviewers',
    ownerId: 'owner-ops',
    reviewers: [],
  },
];

export async function seedDevCollections(
  db: Queryable,
  collections: SeedCollection[] = DEV_COLLECTIONS
): Promise<void> {
  for (const collection of collections) {
    await db.query(
      `INSERT INTO review_collections (id, name, owner_id)
       VALUES ($1, $2, $3)
       ON CONFLICT (id) DO NOTHING`,
      [collection.id, collection.name, collection.ownerId]
    );

    for (const [position, reviewerId] of collection.reviewers.entries()) {
      await db.query(
        `INSERT INTO collection_reviewers (collection_id, reviewer_id, position)
         VALUES ($1, $2, $3)
         ON CONFLICT (collection_id, reviewer_id) DO NOTHING`,
        [collection.id, reviewerId, position]
      );
    }
  }
}
