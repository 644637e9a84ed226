/**
 * Centralized Environment Configuration
 *
 * Validates and exports the environment variables the exporter reads.
 * Only logging is environment-driven; conversion behaviour comes from
 * export options alone.
 *
 * @example
 * ```typescript
 * import { parseEnv } from './config/env.js';
 * const { LOG_LEVEL } = parseEnv();
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    /**
     * Log level for the logger
     * @default 'info'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('info')
        .describe('Log level: debug, info, warn, error'),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * Returns validated env object or throws with descriptive errors
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const errors = result.error.issues
            .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`, {
            issues: result.error.issues,
        });
    }

    return result.data;
}
