import path from 'node:path';
import { configFileSchema, type MarketConfig } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { readJsonFile } from '../utils/fs.js';
import { formatIssues } from '../utils/schema.js';
import { CONFIG_FILE } from '../utils/paths.js';
import { isLogLevel, getLogger } from '../utils/logger.js';
import { ConfigError } from '../errors.js';

export const LOG_LEVEL_ENV = 'PLUGIN_MARKET_LOG_LEVEL';

/**
 * Config Loader — merges `plugin-market.config.json` over the defaults
 *
 * The file is optional at the marketplace root; an explicit path passed
 * with `--config` must exist. `PLUGIN_MARKET_LOG_LEVEL` overrides the
 * configured log level.
 */
export class ConfigLoader {
    constructor(private env: NodeJS.ProcessEnv = process.env) {}

    async load(root: string, explicitPath?: string): Promise<MarketConfig> {
        const configPath = explicitPath
            ? path.resolve(root, explicitPath)
            : path.join(root, CONFIG_FILE);

        const result = await readJsonFile(configPath);
        let config: MarketConfig = { ...DEFAULT_CONFIG, hookEvents: [...DEFAULT_CONFIG.hookEvents] };

        if (result.status === 'missing') {
            if (explicitPath) {
                throw new ConfigError(`Config file not found: ${configPath}`);
            }
        } else if (result.status === 'invalid') {
            throw new ConfigError(`Config file is not valid JSON: ${configPath}`, [result.error]);
        } else {
            const parsed = configFileSchema.safeParse(result.value);
            if (!parsed.success) {
                throw new ConfigError(`Invalid config in ${configPath}`, formatIssues(parsed.error));
            }
            config = { ...config, ...parsed.data };
            getLogger().debug('Loaded config', { path: configPath });
        }

        const envLevel = this.env[LOG_LEVEL_ENV];
        if (envLevel) {
            if (!isLogLevel(envLevel)) {
                throw new ConfigError(`${LOG_LEVEL_ENV} must be one of debug, info, warn, error (got "${envLevel}")`);
            }
            config.logLevel = envLevel;
        }

        return config;
    }
}
