// plugin-market — Public API Surface
export { createCLI } from './cli/index.js';
export { ConfigLoader } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { validatePlugin } from './validation/plugin-validator.js';
export { verifyMarketplace } from './validation/marketplace-verifier.js';
export { isValid, allChecks } from './validation/report.js';
export { discoverPlugins, listPlugins, describePlugin, resolvePluginDir } from './catalog/catalog.js';
export { loadMarketplace, addMarketplaceEntry, resolveEntrySource } from './marketplace/loader.js';
export { PluginLoader, readPluginManifest } from './plugins/loader.js';
export { CommandLoader } from './commands/loader.js';
export { SkillLoader } from './skills/loader.js';
export { parseFrontmatter } from './commands/frontmatter.js';
export { HookRegistry } from './hooks/registry.js';
export { HookRunner } from './hooks/runner.js';
export { PluginBuilder } from './scaffold/builder.js';
export { createPlugin } from './scaffold/create.js';
export { pluginManifestSchema, packageManifestSchema } from './plugins/schema.js';
export { marketplaceManifestSchema } from './marketplace/schema.js';
export { hooksFileSchema } from './hooks/schema.js';
export { Logger, getLogger } from './utils/logger.js';
export * from './errors.js';

// Types
export type { MarketConfig } from './config/schema.js';
export type { Severity, Check, ReportSection, ValidationReport } from './validation/types.js';
export type { VerifyOptions } from './validation/marketplace-verifier.js';
export type { PluginSummary, PluginDetails } from './catalog/catalog.js';
export type { MarketplaceManifest, MarketplaceEntry } from './marketplace/schema.js';
export type { HookEvent, HookDefinition, HookContext, HookResult } from './hooks/types.js';
export type { CommandDefinition } from './commands/types.js';
export type { SkillDefinition } from './skills/types.js';
export type { PluginManifest, PackageManifest, LoadedPlugin } from './plugins/types.js';
export type { PluginMetadata, CommandConfig, AgentConfig, PluginConfig } from './scaffold/types.js';
export type { CreatePluginOptions, CreatePluginResult } from './scaffold/create.js';
