/**
 * Message left through the public contact form.
 */
export interface IContactMessage {
    id: number;
    name: string;
    email: string;
    message: string;
    read: boolean;
    createdAt: Date;
}

export interface IContactMessageInput {
    name: string;
    email: string;
    message: string;
}
