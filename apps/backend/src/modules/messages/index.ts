export { MessagesModule } from './MessagesModule.js';
export type { IMessagesModuleDependencies } from './MessagesModule.js';
export { ContactMessageService, MESSAGES_COLLECTION } from './services/contact-message.service.js';
