/**
 * @file Configuration Loader
 *
 * Loads `config.yaml`, optionally overlays one stage from its `stages`
 * block, substitutes `${NAME}` placeholders and validates the result.
 *
 * Placeholder values come from an explicit variables map built by
 * `variables_resolve`: environment values override the credentials
 * file. With an active stage, `NAME_<STAGE>` is preferred over `NAME`.
 *
 *   datasets:
 *     dataset_repo: data
 *     splits: { train: 0.8, val: 0.1, test: 0.1, seed: 42 }
 *   stages:
 *     dev:
 *       cvat: { url: https://cvat.example.test/api/v1, auth: "Bearer ${CVAT_TOKEN}" }
 *
 * @module config/loader
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { AppConfigSchema, type AppConfig } from './schemas.js';
import { logger_create, type Logger } from '../log/logger.js';

export type ConfigMapping = Record<string, unknown>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface ConfigLoadOptions {
    credentialsPath?: string;
    stage?: string;
    env?: Readonly<Record<string, string | undefined>>;
    logger?: Logger;
}

const PLACEHOLDER: RegExp = /\$\{([^}]+)\}/g;

export function mapping_is(value: unknown): value is ConfigMapping {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a YAML file whose root must be a mapping. No substitution.
 */
export function config_readYaml(filePath: string): ConfigMapping {
    if (!fs.existsSync(filePath)) {
        throw new ConfigError(`Configuration file not found: ${filePath}`);
    }

    let parsed: unknown;
    try {
        parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
    } catch (e: unknown) {
        const reason: string = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`Failed to parse YAML configuration ${filePath}: ${reason}`);
    }

    if (!mapping_is(parsed)) {
        throw new ConfigError(`Configuration file must contain a YAML dictionary: ${filePath}`);
    }
    return parsed;
}

/**
 * Deep-merge `override` into `base`. Nested mappings merge; any other
 * value in `override` replaces the base value. Inputs are not mutated.
 */
export function config_merge(base: ConfigMapping, override: ConfigMapping): ConfigMapping {
    const result: ConfigMapping = { ...base };
    for (const [key, value] of Object.entries(override)) {
        const current: unknown = result[key];
        result[key] = mapping_is(current) && mapping_is(value) ? config_merge(current, value) : value;
    }
    return result;
}

/**
 * Overlay `stages.<stage>` onto the base document and record `_stage`.
 */
export function stage_apply(config: ConfigMapping, stage: string): ConfigMapping {
    const { stages, ...base } = config;
    if (!mapping_is(stages)) {
        throw new ConfigError("'stages' must be a dictionary");
    }
    if (!(stage in stages)) {
        throw new ConfigError(`Stage '${stage}' not found. Available: ${Object.keys(stages).join(', ')}`);
    }
    const stageConfig: unknown = stages[stage];
    if (!mapping_is(stageConfig)) {
        throw new ConfigError(`Stage '${stage}' configuration must be a dictionary`);
    }
    return { ...config_merge(base, stageConfig), _stage: stage };
}

/**
 * Replace `${NAME}` in every string of a nested value.
 *
 * @throws ConfigError naming every variable tried when none is set
 */
export function variables_substitute(
    value: unknown,
    variables: Readonly<Record<string, string>>,
    stage?: string,
): unknown {
    if (typeof value === 'string') {
        return value.replace(PLACEHOLDER, (_match: string, name: string): string => {
            const candidates: string[] = stage ? [`${name}_${stage.toUpperCase()}`, name] : [name];
            for (const candidate of candidates) {
                const resolved: string | undefined = variables[candidate];
                if (resolved !== undefined) return resolved;
            }
            throw new ConfigError(
                `Environment variable '${name}' not found in variables (tried ${candidates.join(', ')})`,
            );
        });
    }
    if (Array.isArray(value)) {
        return value.map((item: unknown): unknown => variables_substitute(item, variables, stage));
    }
    if (mapping_is(value)) {
        const result: ConfigMapping = {};
        for (const [key, item] of Object.entries(value)) {
            result[key] = variables_substitute(item, variables, stage);
        }
        return result;
    }
    return value;
}

/**
 * Combine credentials and environment; the environment wins.
 */
export function variables_resolve(
    credentials: Readonly<Record<string, string>>,
    env: Readonly<Record<string, string | undefined>>,
): Record<string, string> {
    const resolved: Record<string, string> = { ...credentials };
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined) resolved[key] = value;
    }
    return resolved;
}

/**
 * Load a flat credentials file. A missing or unreadable file is
 * tolerated with a warning; a non-string value is not.
 */
export function credentials_load(filePath: string, logger: Logger): Record<string, string> {
    let raw: ConfigMapping;
    try {
        raw = config_readYaml(filePath);
    } catch (e: unknown) {
        const reason: string = e instanceof Error ? e.message : String(e);
        logger.warn(`Failed to load credentials file ${filePath}: ${reason}, using only environment variables`);
        return {};
    }

    const credentials: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw)) {
        if (typeof value !== 'string') {
            throw new ConfigError(`Credentials value for ${key} has to be a string`);
        }
        credentials[key] = value;
    }
    return credentials;
}

/**
 * Validate a resolved document against AppConfigSchema.
 */
export function config_validate(raw: unknown): AppConfig {
    const result = AppConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues: string = result.error.issues
            .map((i): string => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }
    return result.data;
}

/**
 * Load, stage, substitute and validate a configuration file.
 */
export function config_load(configPath: string, options: ConfigLoadOptions = {}): AppConfig {
    const log: Logger = options.logger ?? logger_create('config');
    const raw: ConfigMapping = config_readYaml(configPath);
    const staged: ConfigMapping = options.stage ? stage_apply(raw, options.stage) : raw;

    const credentials: Record<string, string> = options.credentialsPath
        ? credentials_load(options.credentialsPath, log)
        : {};
    const variables: Record<string, string> = variables_resolve(credentials, options.env ?? process.env);

    return config_validate(variables_substitute(staged, variables, options.stage));
}
