import type { MarketConfig } from '../../config/schema.js';

export interface PluginCheckContext {
    /** Absolute plugin directory */
    pluginDir: string;
    config: MarketConfig;
}
