import { z } from 'zod';

/** Remote sources (`{ "source": "github", "repo": "owner/name" }`) */
export const remoteSourceSchema = z.object({
    source: z.string().min(1),
}).passthrough();

export const marketplaceEntrySchema = z.object({
    name: z.string().min(1, 'must not be empty'),
    source: z.union([z.string().min(1), remoteSourceSchema]),
    description: z.string().optional(),
    version: z.string().optional(),
}).passthrough();

/**
 * `.claude-plugin/marketplace.json`
 */
export const marketplaceManifestSchema = z.object({
    name: z.string().min(1, 'must not be empty'),
    owner: z.object({
        name: z.string().min(1, 'must not be empty'),
        email: z.string().optional(),
    }).passthrough(),
    metadata: z.object({
        description: z.string().optional(),
        version: z.string().optional(),
        pluginRoot: z.string().optional(),
    }).passthrough().optional(),
    plugins: z.array(marketplaceEntrySchema),
}).passthrough();

export type MarketplaceEntry = z.infer<typeof marketplaceEntrySchema>;
export type MarketplaceManifest = z.infer<typeof marketplaceManifestSchema>;
