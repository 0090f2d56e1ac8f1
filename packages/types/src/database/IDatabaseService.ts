import type { Document, Filter, UpdateFilter } from 'mongodb';

/**
 * Sort specification accepted by {@link IDatabaseService.find}.
 *
 * Field order matters: the first entry is the primary sort key.
 */
export type SortSpec = Record<string, 1 | -1>;

/**
 * Options for index creation.
 */
export interface IIndexOptions {
    /**
     * Reject a second document with the same key values.
     */
    unique?: boolean;

    /**
     * Skip documents that lack the indexed field. Combined with `unique`, rows
     * without the field never collide.
     */
    sparse?: boolean;

    /**
     * Explicit index name. MongoDB derives one from the keys when omitted.
     */
    name?: string;
}

/**
 * Result of a single-document update.
 */
export interface IUpdateResult {
    matchedCount: number;
    modifiedCount: number;
    upsertedCount: number;
}

/**
 * Database access contract for backend services.
 *
 * Exposes a small convenience tier over MongoDB collections so services never
 * touch driver cursors directly. Implementations must translate unique-index
 * violations into `DuplicateKeyError` so callers can recover from insert races
 * without inspecting driver error codes.
 *
 * @example
 * ```typescript
 * const rows = await database.find<ISectionDocument>('sections', { page: 'home' }, {
 *     sort: { order: 1, id: 1 }
 * });
 * ```
 */
export interface IDatabaseService {
    /**
     * Create an index if it does not exist yet.
     *
     * @param collectionName - Logical collection name
     * @param keys - Indexed fields with their direction
     * @param options - Uniqueness and sparseness flags
     */
    createIndex(collectionName: string, keys: SortSpec, options?: IIndexOptions): Promise<void>;

    /**
     * Count documents matching a filter.
     */
    count<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<number>;

    /**
     * Find documents matching a filter.
     *
     * @param collectionName - Logical collection name
     * @param filter - MongoDB query filter
     * @param options - Sort, skip and limit
     * @returns Matching documents in sort order
     */
    find<T extends Document = Document>(
        collectionName: string,
        filter: Filter<T>,
        options?: { sort?: SortSpec; skip?: number; limit?: number }
    ): Promise<T[]>;

    /**
     * Find the first document matching a filter.
     */
    findOne<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<T | null>;

    /**
     * Insert one document.
     *
     * @throws {DuplicateKeyError} When a unique index rejects the document
     */
    insertOne<T extends Document = Document>(collectionName: string, document: T): Promise<void>;

    /**
     * Insert several documents in one batch.
     *
     * With `ordered: false` every document that does not collide is written
     * even when others are rejected; the duplicate error is still raised after
     * the batch completes.
     *
     * @returns Number of inserted documents
     * @throws {DuplicateKeyError} When a unique index rejects any document
     */
    insertMany<T extends Document = Document>(
        collectionName: string,
        documents: T[],
        options?: { ordered?: boolean }
    ): Promise<number>;

    /**
     * Update the first document matching a filter.
     *
     * With `upsert: true` a missing document is inserted from the filter's
     * equality fields plus the update's `$set` and `$setOnInsert` fields.
     *
     * @throws {DuplicateKeyError} When two upserts race on a unique key
     */
    updateOne<T extends Document = Document>(
        collectionName: string,
        filter: Filter<T>,
        update: UpdateFilter<T>,
        options?: { upsert?: boolean }
    ): Promise<IUpdateResult>;

    /**
     * Delete the first document matching a filter.
     *
     * @returns Whether a document was removed
     */
    deleteOne<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<boolean>;

    /**
     * Delete every document matching a filter.
     *
     * @returns Number of documents deleted
     *
     * @example
     * ```typescript
     * // Drop the comments of a removed post
     * await database.deleteMany('comments', { postId: 7 });
     * ```
     */
    deleteMany<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<number>;

    /**
     * Atomically increment and return a named sequence.
     *
     * Used to assign numeric ids. The first call for a name returns 1.
     */
    nextSequence(name: string): Promise<number>;
}
