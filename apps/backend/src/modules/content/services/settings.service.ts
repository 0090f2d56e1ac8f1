import type { UpdateFilter } from 'mongodb';
import type { IContentCatalog, IDatabaseService, ILogger, ISettingsService } from '@portfolio/types';
import { escalateDuplicate, isDuplicateOn } from '../../../lib/errors.js';
import { lookupLayered, mergeLayers } from '../../../lib/layered-lookup.js';
import type { ISiteSettingDocument } from '../database/index.js';

export const SETTINGS_COLLECTION = 'site_settings';
const KEY_INDEX = 'key_unique';

/**
 * Site settings: catalog defaults with stored values layered on top.
 *
 * Nothing is written until an admin changes a value, so a fresh database
 * serves the catalog defaults unchanged.
 */
export class SettingsService implements ISettingsService {
    private readonly logger: ILogger;

    constructor(
        private readonly database: IDatabaseService,
        private readonly catalog: IContentCatalog,
        logger: ILogger
    ) {
        this.logger = logger.child({ service: 'settings-service' });
    }

    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(SETTINGS_COLLECTION, { key: 1 }, { unique: true, name: KEY_INDEX });
    }

    async getSetting(key: string): Promise<string> {
        const stored = await this.database.findOne<ISiteSettingDocument>(SETTINGS_COLLECTION, { key });
        if (stored) {
            return stored.value;
        }
        return lookupLayered(key, this.catalog.getSettingDefaults()) ?? '';
    }

    async getAllSettings(): Promise<Record<string, string>> {
        const docs = await this.database.find<ISiteSettingDocument>(SETTINGS_COLLECTION, {}, { sort: { key: 1 } });
        const stored = Object.fromEntries(docs.map(doc => [doc.key, doc.value]));
        return mergeLayers(this.catalog.getSettingDefaults(), stored);
    }

    /**
     * Upsert a setting.
     *
     * A new row without an explicit description takes the catalog's
     * description for that key, or `''`. An existing description is only
     * replaced when one is given.
     */
    async setSetting(key: string, value: string, description?: string): Promise<void> {
        const now = new Date();
        const update: UpdateFilter<ISiteSettingDocument> = description === undefined
            ? {
                $set: { value, updatedAt: now },
                $setOnInsert: { description: this.catalog.getSettingDescription(key) }
            }
            : { $set: { value, description, updatedAt: now } };

        try {
            await this.database.updateOne<ISiteSettingDocument>(SETTINGS_COLLECTION, { key }, update, { upsert: true });
        } catch (error) {
            if (!isDuplicateOn(error, KEY_INDEX)) {
                throw escalateDuplicate(error);
            }
            // Two upserts raced to insert; the row exists now, so this one updates it
            await this.database.updateOne<ISiteSettingDocument>(SETTINGS_COLLECTION, { key }, update);
        }

        this.logger.info({ key }, 'Setting saved');
    }

    /**
     * Save several values at once, keeping existing descriptions.
     */
    async setSettings(values: Record<string, string>): Promise<void> {
        for (const [key, value] of Object.entries(values)) {
            await this.setSetting(key, value);
        }
    }
}
