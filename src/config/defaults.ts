import { ALL_HOOK_EVENTS } from '../hooks/types.js';
import type { MarketConfig } from './schema.js';

export const DEFAULT_CONFIG: MarketConfig = {
    pluginsDir: 'plugins',
    marketplaceFile: '.claude-plugin/marketplace.json',
    requirePackageJson: true,
    strict: false,
    hookEvents: [...ALL_HOOK_EVENTS],
    logLevel: 'info',
};
