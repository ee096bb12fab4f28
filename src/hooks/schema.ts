import { z } from 'zod';

export const hookCommandSchema = z.object({
    type: z.literal('command'),
    command: z.string().min(1),
    timeout: z.number().positive().optional(),
}).passthrough();

export const hookMatcherSchema = z.object({
    matcher: z.string().optional(),
    hooks: z.array(hookCommandSchema),
}).passthrough();

/**
 * `hooks/hooks.json`. Event names are checked against the configured list
 * by the registry and validator, not here.
 */
export const hooksFileSchema = z.object({
    description: z.string().optional(),
    hooks: z.record(z.array(hookMatcherSchema)),
}).passthrough();

export type HooksFile = z.infer<typeof hooksFileSchema>;
