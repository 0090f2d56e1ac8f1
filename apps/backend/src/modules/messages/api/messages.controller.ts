import type { Request, Response } from 'express';
import type { IContactMessage, IContactMessageService } from '@portfolio/types';
import { parseIdParam } from '../../../api/params.js';
import { NotFoundError } from '../../../lib/errors.js';
import { contactMessageSchema } from './messages.schemas.js';

function serializeMessage(message: IContactMessage) {
    return {
        id: message.id,
        name: message.name,
        email: message.email,
        message: message.message,
        read: message.read,
        created_at: message.createdAt
    };
}

/**
 * Contact form endpoints.
 */
export class MessagesController {
    constructor(private readonly messageService: IContactMessageService) {}

    /**
     * POST /api/content/contact
     *
     * Request body: { name, email, message }
     */
    async submitMessage(req: Request, res: Response): Promise<void> {
        const body = contactMessageSchema.parse(req.body);
        const message = await this.messageService.submitMessage(body);
        res.status(201).json({ success: true, id: message.id });
    }

    /**
     * GET /api/admin/messages
     *
     * Newest first, with the unread count for the dashboard badge.
     */
    async listMessages(_req: Request, res: Response): Promise<void> {
        const [messages, unread] = await Promise.all([
            this.messageService.listMessages(),
            this.messageService.countUnread()
        ]);
        res.json({ messages: messages.map(serializeMessage), unread });
    }

    /**
     * GET /api/admin/messages/:id
     *
     * Opening a message marks it read.
     */
    async getMessage(req: Request, res: Response): Promise<void> {
        const message = await this.messageService.openMessage(parseIdParam(req.params.id, 'Message'));
        if (!message) {
            throw new NotFoundError('Message not found');
        }
        res.json(serializeMessage(message));
    }

    /**
     * DELETE /api/admin/messages/:id
     */
    async deleteMessage(req: Request, res: Response): Promise<void> {
        const deleted = await this.messageService.deleteMessage(parseIdParam(req.params.id, 'Message'));
        if (!deleted) {
            throw new NotFoundError('Message not found');
        }
        res.json({ success: true });
    }
}
