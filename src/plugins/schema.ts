import { z } from 'zod';
import { VERSION_FORMAT } from '../utils/naming.js';

const versionSchema = z.string().regex(VERSION_FORMAT, 'must be in major.minor.patch format');

const pathListSchema = z.union([z.string().min(1), z.array(z.string().min(1))]);

export const authorSchema = z.object({
    name: z.string().min(1, 'must not be empty'),
    email: z.string().optional(),
    url: z.string().optional(),
}).passthrough();

/**
 * `.claude-plugin/plugin.json`
 *
 * Kebab-case naming and keywords are reported separately by the validator,
 * so they are not enforced here.
 */
export const pluginManifestSchema = z.object({
    name: z.string().min(1, 'must not be empty'),
    description: z.string().min(1, 'must not be empty'),
    version: versionSchema,
    author: authorSchema,
    keywords: z.array(z.string()).optional(),
    homepage: z.string().optional(),
    repository: z.union([z.string(), z.object({ url: z.string() }).passthrough()]).optional(),
    license: z.string().optional(),
    commands: pathListSchema.optional(),
    agents: pathListSchema.optional(),
    hooks: z.union([z.string().min(1), z.record(z.unknown())]).optional(),
    mcpServers: z.union([z.string().min(1), z.record(z.unknown())]).optional(),
}).passthrough();

export type PluginManifest = z.infer<typeof pluginManifestSchema>;
export type PluginAuthor = z.infer<typeof authorSchema>;

/**
 * The plugin's own `package.json`
 */
export const packageManifestSchema = z.object({
    name: z.string().min(1, 'must not be empty'),
    version: versionSchema,
    description: z.string().min(1, 'must not be empty'),
}).passthrough();

export type PackageManifest = z.infer<typeof packageManifestSchema>;
