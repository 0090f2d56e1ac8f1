import type {
    IContactMessage,
    IContactMessageInput,
    IContactMessageService,
    IDatabaseService,
    ILogger
} from '@portfolio/types';
import { escalateDuplicate } from '../../../lib/errors.js';
import type { IContactMessageDocument } from '../database/index.js';

export const MESSAGES_COLLECTION = 'contact_messages';

const MESSAGE_SEQUENCE = 'contact_messages';

function toMessage(doc: IContactMessageDocument): IContactMessage {
    return {
        id: doc.id,
        name: doc.name,
        email: doc.email,
        message: doc.message,
        read: doc.read,
        createdAt: doc.createdAt
    };
}

/**
 * Contact form inbox.
 */
export class ContactMessageService implements IContactMessageService {
    private readonly logger: ILogger;

    constructor(
        private readonly database: IDatabaseService,
        logger: ILogger
    ) {
        this.logger = logger.child({ service: 'contact-message-service' });
    }

    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(MESSAGES_COLLECTION, { id: 1 }, { unique: true, name: 'id_unique' });
        await this.database.createIndex(MESSAGES_COLLECTION, { read: 1 }, { name: 'read' });
    }

    async submitMessage(input: IContactMessageInput): Promise<IContactMessage> {
        const doc: IContactMessageDocument = {
            id: await this.database.nextSequence(MESSAGE_SEQUENCE),
            name: input.name,
            email: input.email,
            message: input.message,
            read: false,
            createdAt: new Date()
        };

        try {
            await this.database.insertOne(MESSAGES_COLLECTION, doc);
        } catch (error) {
            throw escalateDuplicate(error);
        }

        // The address stays out of the log
        this.logger.info({ id: doc.id }, 'Contact message received');
        return toMessage(doc);
    }

    async listMessages(): Promise<IContactMessage[]> {
        const docs = await this.database.find<IContactMessageDocument>(MESSAGES_COLLECTION, {}, {
            sort: { createdAt: -1, id: -1 }
        });
        return docs.map(toMessage);
    }

    async openMessage(id: number): Promise<IContactMessage | null> {
        const doc = await this.database.findOne<IContactMessageDocument>(MESSAGES_COLLECTION, { id });
        if (!doc) {
            return null;
        }

        if (!doc.read) {
            await this.database.updateOne<IContactMessageDocument>(MESSAGES_COLLECTION, { id }, { $set: { read: true } });
        }
        return toMessage({ ...doc, read: true });
    }

    async deleteMessage(id: number): Promise<boolean> {
        const deleted = await this.database.deleteOne<IContactMessageDocument>(MESSAGES_COLLECTION, { id });
        if (deleted) {
            this.logger.info({ id }, 'Deleted contact message');
        }
        return deleted;
    }

    async countUnread(): Promise<number> {
        return this.database.count<IContactMessageDocument>(MESSAGES_COLLECTION, { read: false });
    }
}
