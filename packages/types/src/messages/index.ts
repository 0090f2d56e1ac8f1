export type { IContactMessage, IContactMessageInput } from './IContactMessage.js';
export type { IContactMessageService } from './IContactMessageService.js';
