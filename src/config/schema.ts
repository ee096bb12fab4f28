import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

/**
 * Shape of `plugin-market.config.json`; every key is optional on disk
 */
export const configFileSchema = z.object({
    pluginsDir: z.string().min(1).optional(),
    marketplaceFile: z.string().min(1).optional(),
    marketplaceName: z.string().min(1).optional(),
    requirePackageJson: z.boolean().optional(),
    strict: z.boolean().optional(),
    hookEvents: z.array(z.string().min(1)).min(1).optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface MarketConfig {
    /** Directory holding plugins, relative to the marketplace root */
    pluginsDir: string;
    /** Marketplace manifest, relative to the marketplace root */
    marketplaceFile: string;
    /** Name used in install hints; falls back to the manifest's name */
    marketplaceName?: string;
    /** A missing package.json is an error rather than a warning */
    requirePackageJson: boolean;
    /** Warnings fail validation */
    strict: boolean;
    /** Event names accepted in hooks.json */
    hookEvents: string[];
    logLevel: typeof LOG_LEVELS[number];
}
