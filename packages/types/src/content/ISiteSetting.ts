/**
 * Flat key/value site setting such as the site name or footer text.
 */
export interface ISiteSetting {
    key: string;
    value: string;
    description: string;
    updatedAt: Date;
}
