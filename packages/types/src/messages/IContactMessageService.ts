import type { IContactMessage, IContactMessageInput } from './IContactMessage.js';

/**
 * Contact form inbox.
 */
export interface IContactMessageService {
    /**
     * Store a new, unread message.
     */
    submitMessage(input: IContactMessageInput): Promise<IContactMessage>;

    /**
     * Messages newest first.
     */
    listMessages(): Promise<IContactMessage[]>;

    /**
     * Fetch a message and mark it read.
     *
     * @returns The message as read, or null for an unknown id
     */
    openMessage(id: number): Promise<IContactMessage | null>;

    deleteMessage(id: number): Promise<boolean>;

    countUnread(): Promise<number>;
}
