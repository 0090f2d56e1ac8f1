/**
 * Site settings with static defaults layered under stored values.
 */
export interface ISettingsService {
    /**
     * Stored value, else the default, else `''`.
     */
    getSetting(key: string): Promise<string>;

    /**
     * Every default key plus every stored key; stored values win.
     */
    getAllSettings(): Promise<Record<string, string>>;

    /**
     * Upsert by key. The description is only written when given.
     */
    setSetting(key: string, value: string, description?: string): Promise<void>;

    /**
     * Upsert several values, keeping existing descriptions.
     */
    setSettings(values: Record<string, string>): Promise<void>;
}
