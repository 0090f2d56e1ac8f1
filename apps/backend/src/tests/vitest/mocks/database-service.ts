/**
 * Centralized IDatabaseService stand-in for Vitest.
 *
 * An in-memory implementation of the convenience tier that services run
 * against in unit tests. It behaves like MongoDB where the services rely on
 * it:
 *
 * - **Unique indexes** declared through createIndex() are enforced; a
 *   violation throws DuplicateKeyError naming the index, as DatabaseService
 *   does after translating driver code 11000. Sparse unique indexes skip
 *   documents that lack every indexed field.
 * - **Unordered insertMany** writes every non-colliding document before
 *   raising the duplicate error.
 * - **Upserts** seed the new document from the filter's equality fields and
 *   honor `$setOnInsert`.
 * - **Reads return copies**, so callers cannot mutate stored rows by accident.
 *
 * Every method is async, so two concurrent callers interleave at each await
 * the way two requests would against the real server.
 *
 * @example
 * ```typescript
 * import { createMockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
 *
 * let mockDb: MockDatabaseService;
 *
 * beforeEach(() => {
 *     mockDb = createMockDatabaseService();
 * });
 *
 * it('should store data', async () => {
 *     const service = new SectionService(mockDb, catalog, markdown, logger);
 *     await service.getOrCreateSection('home', 'hero');
 *     expect(mockDb.getCollectionData('sections')).toHaveLength(1);
 * });
 * ```
 */

import { ObjectId } from 'mongodb';
import type { Document, Filter, UpdateFilter } from 'mongodb';
import type { IDatabaseService, IIndexOptions, IUpdateResult, SortSpec } from '@portfolio/types';
import { DuplicateKeyError } from '../../../lib/errors.js';
import { applyUpdate, compareValues, equalityFields, getFieldValue, matchesFilter } from './filter.js';

interface IMockIndex {
    name: string;
    keys: SortSpec;
    unique: boolean;
    sparse: boolean;
}

/**
 * Mock database service with test helpers.
 */
export interface MockDatabaseService extends IDatabaseService {
    /**
     * Clear all collections, indexes, counters and injected errors.
     */
    clear(): void;

    /**
     * Get a copy of the raw collection data for assertions.
     *
     * @param collectionName - Logical collection name
     * @returns Documents in insertion order
     */
    getCollectionData(collectionName: string): Document[];

    /**
     * Indexes declared on a collection through createIndex().
     */
    getIndexes(collectionName: string): IMockIndex[];

    /**
     * Inject an error into the next call of an operation on a collection.
     *
     * @param collectionName - Target collection
     * @param operation - Method name to fail (findOne, insertOne, etc.)
     * @param error - Error to throw
     */
    injectError(collectionName: string, operation: string, error: Error): void;
}

/**
 * Stored rows are untyped; the caller names the row type, as with the driver.
 */
function asRows<T extends Document>(docs: Document[]): T[] {
    return docs as T[];
}

/**
 * Create a mock IDatabaseService instance.
 *
 * Each invocation creates a fresh instance with empty collections.
 *
 * @returns Mock database service with test helpers
 */
export function createMockDatabaseService(): MockDatabaseService {
    const collections = new Map<string, Document[]>();
    const indexes = new Map<string, IMockIndex[]>();
    const counters = new Map<string, number>();
    const injectedErrors = new Map<string, Error>();

    function ensureCollection(name: string): Document[] {
        let data = collections.get(name);
        if (!data) {
            data = [];
            collections.set(name, data);
        }
        return data;
    }

    /**
     * Check for injected errors and throw if found. Injection is one-shot.
     */
    function checkInjectedError(collectionName: string, operation: string): void {
        const key = `${collectionName}:${operation}`;
        const error = injectedErrors.get(key);
        if (error) {
            injectedErrors.delete(key);
            throw error;
        }
    }

    /**
     * Index key of a document, or null when a sparse index skips it.
     */
    function indexKey(doc: Document, index: IMockIndex): string | null {
        const values = Object.keys(index.keys).map(field => getFieldValue(doc, field));
        if (index.sparse && values.every(value => value === undefined)) {
            return null;
        }
        return JSON.stringify(values.map(value => value ?? null));
    }

    /**
     * Throw DuplicateKeyError if `candidate` collides with any other stored row.
     */
    function assertUnique(collectionName: string, candidate: Document, ignore?: Document): void {
        const data = ensureCollection(collectionName);
        for (const index of indexes.get(collectionName) ?? []) {
            if (!index.unique) {
                continue;
            }
            const key = indexKey(candidate, index);
            if (key === null) {
                continue;
            }
            const clash = data.some(existing => existing !== ignore && indexKey(existing, index) === key);
            if (clash) {
                throw new DuplicateKeyError(`Duplicate key in ${collectionName}`, {
                    collection: collectionName,
                    index: index.name,
                    keys: index.keys
                }, index.name);
            }
        }
    }

    function insertDocument(collectionName: string, document: Document): void {
        const stored = structuredClone(document);
        if (stored._id === undefined) {
            stored._id = new ObjectId();
        }
        assertUnique(collectionName, stored);
        ensureCollection(collectionName).push(stored);
    }

    return {
        // ============================================================
        // Index management
        // ============================================================

        async createIndex(collectionName: string, keys: SortSpec, options?: IIndexOptions): Promise<void> {
            checkInjectedError(collectionName, 'createIndex');
            const declared = indexes.get(collectionName) ?? [];
            const signature = JSON.stringify(keys);
            if (!declared.some(index => JSON.stringify(index.keys) === signature)) {
                declared.push({
                    // MongoDB's default name, e.g. `page_1_sectionKey_1`
                    name: options?.name ?? Object.entries(keys).map(([field, direction]) => `${field}_${direction}`).join('_'),
                    keys,
                    unique: options?.unique ?? false,
                    sparse: options?.sparse ?? false
                });
            }
            indexes.set(collectionName, declared);
        },

        // ============================================================
        // Reads
        // ============================================================

        async count<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<number> {
            checkInjectedError(collectionName, 'count');
            return ensureCollection(collectionName).filter(doc => matchesFilter(doc, filter)).length;
        },

        async find<T extends Document = Document>(
            collectionName: string,
            filter: Filter<T>,
            options?: { sort?: SortSpec; skip?: number; limit?: number }
        ): Promise<T[]> {
            checkInjectedError(collectionName, 'find');
            let results = ensureCollection(collectionName).filter(doc => matchesFilter(doc, filter));

            if (options?.sort) {
                const entries = Object.entries(options.sort);
                // Array.prototype.sort is stable, so ties keep insertion order like the natural order
                results = [...results].sort((a, b) => {
                    for (const [field, direction] of entries) {
                        const compared = compareValues(getFieldValue(a, field), getFieldValue(b, field));
                        if (compared !== 0) {
                            return direction === 1 ? compared : -compared;
                        }
                    }
                    return 0;
                });
            }
            if (options?.skip) {
                results = results.slice(options.skip);
            }
            if (options?.limit) {
                results = results.slice(0, options.limit);
            }

            return asRows<T>(results.map(doc => structuredClone(doc)));
        },

        async findOne<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<T | null> {
            checkInjectedError(collectionName, 'findOne');
            const found = ensureCollection(collectionName).find(doc => matchesFilter(doc, filter));
            return found ? asRows<T>([structuredClone(found)])[0] : null;
        },

        // ============================================================
        // Writes
        // ============================================================

        async insertOne<T extends Document = Document>(collectionName: string, document: T): Promise<void> {
            checkInjectedError(collectionName, 'insertOne');
            insertDocument(collectionName, document);
        },

        async insertMany<T extends Document = Document>(
            collectionName: string,
            documents: T[],
            options?: { ordered?: boolean }
        ): Promise<number> {
            checkInjectedError(collectionName, 'insertMany');
            const ordered = options?.ordered ?? true;
            let inserted = 0;
            let firstError: unknown = null;

            for (const document of documents) {
                try {
                    insertDocument(collectionName, document);
                    inserted++;
                } catch (error) {
                    if (ordered) {
                        throw error;
                    }
                    firstError ??= error;
                }
            }

            if (firstError) {
                throw firstError;
            }
            return inserted;
        },

        async updateOne<T extends Document = Document>(
            collectionName: string,
            filter: Filter<T>,
            update: UpdateFilter<T>,
            options?: { upsert?: boolean }
        ): Promise<IUpdateResult> {
            checkInjectedError(collectionName, 'updateOne');
            const data = ensureCollection(collectionName);
            const index = data.findIndex(doc => matchesFilter(doc, filter));

            if (index !== -1) {
                const existing = data[index];
                const updated = structuredClone(existing);
                applyUpdate(updated, update, false);
                assertUnique(collectionName, updated, existing);
                const modified = JSON.stringify(updated) !== JSON.stringify(existing);
                data[index] = updated;
                return { matchedCount: 1, modifiedCount: modified ? 1 : 0, upsertedCount: 0 };
            }

            if (options?.upsert) {
                const created = equalityFields(filter);
                applyUpdate(created, update, true);
                insertDocument(collectionName, created);
                return { matchedCount: 0, modifiedCount: 0, upsertedCount: 1 };
            }

            return { matchedCount: 0, modifiedCount: 0, upsertedCount: 0 };
        },

        async deleteOne<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<boolean> {
            checkInjectedError(collectionName, 'deleteOne');
            const data = ensureCollection(collectionName);
            const index = data.findIndex(doc => matchesFilter(doc, filter));
            if (index === -1) {
                return false;
            }
            data.splice(index, 1);
            return true;
        },

        async deleteMany<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<number> {
            checkInjectedError(collectionName, 'deleteMany');
            const data = ensureCollection(collectionName);
            const kept = data.filter(doc => !matchesFilter(doc, filter));
            const deleted = data.length - kept.length;
            data.splice(0, data.length, ...kept);
            return deleted;
        },

        async nextSequence(name: string): Promise<number> {
            checkInjectedError('counters', 'nextSequence');
            const next = (counters.get(name) ?? 0) + 1;
            counters.set(name, next);
            return next;
        },

        // ============================================================
        // Test helpers
        // ============================================================

        clear(): void {
            collections.clear();
            indexes.clear();
            counters.clear();
            injectedErrors.clear();
        },

        getCollectionData(collectionName: string): Document[] {
            return ensureCollection(collectionName).map(doc => structuredClone(doc));
        },

        getIndexes(collectionName: string): IMockIndex[] {
            return [...(indexes.get(collectionName) ?? [])];
        },

        injectError(collectionName: string, operation: string, error: Error): void {
            injectedErrors.set(`${collectionName}:${operation}`, error);
        }
    };
}
