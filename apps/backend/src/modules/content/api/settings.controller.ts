import type { Request, Response } from 'express';
import type { ISettingsService } from '@portfolio/types';
import { updateSettingsSchema } from './content.schemas.js';

/**
 * Site settings endpoints. The public and admin reads return the same merged
 * map; only the admin router can write.
 */
export class SettingsController {
    constructor(private readonly settingsService: ISettingsService) {}

    /**
     * GET /api/content/settings and GET /api/admin/settings
     */
    async getSettings(_req: Request, res: Response): Promise<void> {
        res.json({ settings: await this.settingsService.getAllSettings() });
    }

    /**
     * PUT /api/admin/settings
     *
     * Response: { success, settings } with the merged map after the write
     */
    async updateSettings(req: Request, res: Response): Promise<void> {
        const body = updateSettingsSchema.parse(req.body);

        if ('settings' in body) {
            await this.settingsService.setSettings(body.settings);
        } else {
            await this.settingsService.setSetting(body.key, body.value, body.description);
        }

        res.json({ success: true, settings: await this.settingsService.getAllSettings() });
    }
}
