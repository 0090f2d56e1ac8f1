/**
 * Messages module implementation.
 *
 * Public contact form submission and the admin inbox.
 */

import type { Express, RequestHandler } from 'express';
import type { IDatabaseService, ILogger, IModule, IModuleMetadata } from '@portfolio/types';
import { ContactMessageService } from './services/contact-message.service.js';
import { MessagesController } from './api/messages.controller.js';
import { createMessagesAdminRouter, createPublicMessagesRouter } from './api/messages.routes.js';

export interface IMessagesModuleDependencies {
    database: IDatabaseService;
    requireAdmin: RequestHandler;
    app: Express;
    logger: ILogger;
}

export class MessagesModule implements IModule<IMessagesModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'messages',
        name: 'Messages',
        version: '1.0.0',
        description: 'Contact form submissions and admin inbox'
    };

    private app!: Express;
    private requireAdmin!: RequestHandler;
    private logger!: ILogger;

    private messageService!: ContactMessageService;
    private controller!: MessagesController;

    async init(dependencies: IMessagesModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: 'messages' });
        this.app = dependencies.app;
        this.requireAdmin = dependencies.requireAdmin;

        this.messageService = new ContactMessageService(dependencies.database, this.logger);
        this.controller = new MessagesController(this.messageService);

        this.logger.info('Messages module initialized');
    }

    async run(): Promise<void> {
        await this.messageService.ensureIndexes();

        this.app.use('/api/content', createPublicMessagesRouter(this.controller));
        this.app.use('/api/admin', createMessagesAdminRouter(this.controller, this.requireAdmin));

        this.logger.info('Messages module running');
    }
}
