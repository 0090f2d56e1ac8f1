import { Router } from 'express';
import type { RequestHandler } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { MessagesController } from './messages.controller.js';

/**
 * Create the public contact router. Mounted at /api/content.
 */
export function createPublicMessagesRouter(messages: MessagesController): Router {
    const router = Router();
    router.post('/contact', asyncHandler(messages.submitMessage.bind(messages)));
    return router;
}

/**
 * Create the inbox admin router. Mounted at /api/admin behind the admin
 * guard.
 */
export function createMessagesAdminRouter(messages: MessagesController, requireAdmin: RequestHandler): Router {
    const router = Router();

    router.use('/messages', requireAdmin);

    router.get('/messages', asyncHandler(messages.listMessages.bind(messages)));
    router.get('/messages/:id', asyncHandler(messages.getMessage.bind(messages)));
    router.delete('/messages/:id', asyncHandler(messages.deleteMessage.bind(messages)));

    return router;
}
