import { MongoBulkWriteError, MongoServerError } from 'mongodb';
import type { Collection, Db, Document, Filter, OptionalUnlessRequiredId, UpdateFilter } from 'mongodb';
import type { IDatabaseService, IIndexOptions, ILogger, IUpdateResult, SortSpec } from '@portfolio/types';
import { DuplicateKeyError } from '../../lib/errors.js';

/**
 * MongoDB server error code for a unique index violation.
 */
const DUPLICATE_KEY_CODE = 11000;

/**
 * Collection holding named id sequences.
 */
const COUNTERS_COLLECTION = 'counters';

interface ICounterDocument {
    _id: string;
    seq: number;
}

/**
 * Database service providing the convenience tier over the MongoDB driver.
 *
 * Services call the helper methods (find, insertOne, updateOne...) instead of
 * holding driver collections, which keeps them testable against the in-memory
 * stand-in. Driver duplicate-key failures (code 11000) surface as
 * {@link DuplicateKeyError} so get-or-create callers can re-read on a lost
 * insert race.
 *
 * @example
 * ```typescript
 * const client = await connectDatabase();
 * const database = new DatabaseService(client.db(), logger.child({ module: 'database' }));
 * const home = await database.find('sections', { page: 'home' }, { sort: { order: 1 } });
 * ```
 */
export class DatabaseService implements IDatabaseService {
    /**
     * Create a database service instance.
     *
     * @param db - Connected driver database handle
     * @param logger - Logger for index and sequence diagnostics
     */
    constructor(
        private readonly db: Db,
        private readonly logger: ILogger
    ) {}

    /**
     * Get a native driver collection.
     *
     * Collection names are restricted to letters, digits, underscores and
     * dashes; anything else is replaced with an underscore.
     *
     * @param name - Logical collection name
     * @returns MongoDB native collection
     */
    public getCollection<T extends Document = Document>(name: string): Collection<T> {
        if (!name) {
            throw new Error('Collection name must be a non-empty string');
        }
        return this.db.collection<T>(name.replace(/[^a-zA-Z0-9_-]/g, '_'));
    }

    public async createIndex(collectionName: string, keys: SortSpec, options?: IIndexOptions): Promise<void> {
        const collection = this.getCollection(collectionName);
        await collection.createIndex(keys, options ?? {});
        this.logger.info({ collection: collectionName, keys, options }, 'Ensured collection index');
    }

    public async count<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<number> {
        return await this.getCollection<T>(collectionName).countDocuments(filter);
    }

    public async find<T extends Document = Document>(
        collectionName: string,
        filter: Filter<T>,
        options?: { sort?: SortSpec; skip?: number; limit?: number }
    ): Promise<T[]> {
        let cursor = this.getCollection<T>(collectionName).find(filter);

        if (options?.sort) {
            cursor = cursor.sort(options.sort);
        }
        if (options?.skip) {
            cursor = cursor.skip(options.skip);
        }
        if (options?.limit) {
            cursor = cursor.limit(options.limit);
        }

        return (await cursor.toArray()) as T[];
    }

    public async findOne<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<T | null> {
        return (await this.getCollection<T>(collectionName).findOne(filter)) as T | null;
    }

    /**
     * Insert a single document.
     *
     * @throws {DuplicateKeyError} On a unique index violation (code 11000)
     */
    public async insertOne<T extends Document = Document>(collectionName: string, document: T): Promise<void> {
        try {
            await this.getCollection<T>(collectionName).insertOne(document as OptionalUnlessRequiredId<T>);
        } catch (error) {
            throw this.translateError(error, collectionName);
        }
    }

    /**
     * Insert several documents.
     *
     * Unordered batches keep going past duplicates. The duplicate error is
     * raised once the batch is done and carries the inserted count in its
     * details.
     *
     * @throws {DuplicateKeyError} When any document hits a unique index
     */
    public async insertMany<T extends Document = Document>(
        collectionName: string,
        documents: T[],
        options?: { ordered?: boolean }
    ): Promise<number> {
        if (documents.length === 0) {
            return 0;
        }

        try {
            const result = await this.getCollection<T>(collectionName).insertMany(
                documents as OptionalUnlessRequiredId<T>[],
                { ordered: options?.ordered ?? true }
            );
            return result.insertedCount;
        } catch (error) {
            throw this.translateError(error, collectionName);
        }
    }

    public async updateOne<T extends Document = Document>(
        collectionName: string,
        filter: Filter<T>,
        update: UpdateFilter<T>,
        options?: { upsert?: boolean }
    ): Promise<IUpdateResult> {
        try {
            const result = await this.getCollection<T>(collectionName).updateOne(filter, update, {
                upsert: options?.upsert ?? false
            });
            return {
                matchedCount: result.matchedCount,
                modifiedCount: result.modifiedCount,
                upsertedCount: result.upsertedCount
            };
        } catch (error) {
            throw this.translateError(error, collectionName);
        }
    }

    public async deleteOne<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<boolean> {
        const result = await this.getCollection<T>(collectionName).deleteOne(filter);
        return result.deletedCount > 0;
    }

    public async deleteMany<T extends Document = Document>(collectionName: string, filter: Filter<T>): Promise<number> {
        const result = await this.getCollection<T>(collectionName).deleteMany(filter);
        return result.deletedCount;
    }

    /**
     * Atomically increment a named counter.
     *
     * Upserting with `$inc` makes the first call create the counter at 1.
     */
    public async nextSequence(name: string): Promise<number> {
        const counters = this.getCollection<ICounterDocument>(COUNTERS_COLLECTION);
        const counter = await counters.findOneAndUpdate(
            { _id: name },
            { $inc: { seq: 1 } },
            { upsert: true, returnDocument: 'after' }
        );

        if (!counter) {
            throw new Error(`Sequence "${name}" could not be incremented`);
        }

        return counter.seq;
    }

    /**
     * Map driver duplicate-key failures to the domain error, pass others through.
     */
    private translateError(error: unknown, collectionName: string): unknown {
        if (!isDuplicateKeyFailure(error)) {
            return error;
        }

        const insertedCount = error instanceof MongoBulkWriteError ? error.insertedCount : undefined;
        const index = violatedIndex(error);
        this.logger.debug({ collection: collectionName, index, insertedCount }, 'Duplicate key rejected by unique index');
        return new DuplicateKeyError(`Duplicate key in ${collectionName}`, {
            collection: collectionName,
            index,
            insertedCount
        }, index);
    }
}

/**
 * Index name in a server message such as
 * `E11000 duplicate key error collection: cms.sections index: id_unique dup key: { id: 4 }`.
 */
const INDEX_IN_MESSAGE = /index: (\S+) dup key/;

function indexFromMessage(message: string | undefined): string | null {
    return message?.match(INDEX_IN_MESSAGE)?.[1] ?? null;
}

/**
 * Name of the unique index a duplicate-key failure violated.
 *
 * A bulk failure names an index only when every failed write hit the same
 * one; mixed or unparseable messages yield null.
 */
function violatedIndex(error: MongoBulkWriteError | MongoServerError): string | null {
    if (error instanceof MongoBulkWriteError) {
        const writeErrors = Array.isArray(error.writeErrors) ? error.writeErrors : [error.writeErrors];
        const names = new Set(writeErrors.map(writeError => indexFromMessage(writeError.errmsg)));
        const [only] = names;
        return names.size === 1 ? only ?? null : null;
    }
    return indexFromMessage(error.message);
}

/**
 * Whether a driver error is a unique index violation.
 *
 * A bulk insert counts only when every failed write was a duplicate key, so a
 * batch that also hit a validation error still surfaces as a driver error.
 */
function isDuplicateKeyFailure(error: unknown): error is MongoBulkWriteError | MongoServerError {
    if (error instanceof MongoBulkWriteError) {
        const writeErrors = Array.isArray(error.writeErrors) ? error.writeErrors : [error.writeErrors];
        return writeErrors.length > 0 && writeErrors.every(writeError => writeError.code === DUPLICATE_KEY_CODE);
    }
    return error instanceof MongoServerError && error.code === DUPLICATE_KEY_CODE;
}
