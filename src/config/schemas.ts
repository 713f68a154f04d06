/**
 * @file Configuration Schemas
 *
 * Zod schemas for the resolved configuration document (after stage
 * merging and variable substitution). Unknown keys are kept so that
 * stage-specific extras survive validation.
 *
 * @module config/schemas
 */

import { z } from 'zod';

const RatioSchema = z.number().nonnegative('split ratio must be non-negative');

export const SplitsSchema = z.object({
    train: RatioSchema,
    val:   RatioSchema,
    test:  RatioSchema,
    seed:  z.number().int('seed must be an integer').safe('seed must be a safe integer'),
});

export const DatasetsSchema = z.object({
    dataset_repo: z.string().min(1, 'dataset_repo is required'),
    splits:       SplitsSchema,
    splitter:     z.enum(['certificate', 'hash']).default('certificate'),
}).passthrough();

export const CvatSchema = z.object({
    url:  z.string().url('cvat.url must be a URL'),
    auth: z.string().min(1, 'cvat.auth is required'),
}).passthrough();

export const AppConfigSchema = z.object({
    datasets: DatasetsSchema,
    cvat:     CvatSchema.optional(),
    _stage:   z.string().optional(),
}).passthrough();

export type SplitsConfig = z.infer<typeof SplitsSchema>;
export type CvatConfig   = z.infer<typeof CvatSchema>;
export type AppConfig    = z.infer<typeof AppConfigSchema>;
