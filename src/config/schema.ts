/**
 * Configuration Schema
 * Define and validate engine configuration
 */

import { z } from 'zod';
import { TransportModeSchema } from '@/types';

export const TargetConfigSchema = z.object({
    /** SL site id of the stop to poll */
    siteId: z.coerce.string().min(1),
    siteName: z.string().default(''),
    /** Accepted transport modes */
    transportModes: z.array(TransportModeSchema).min(1).default(['TRAIN']),
    /** Line designations, comma-separated ("" for all lines) */
    line: z.string().default(''),
    /** Upstream direction code ("" for both directions) */
    directionCode: z.coerce.string().default(''),
    directionName: z.string().default(''),
    /** Polling interval in seconds */
    scanInterval: z.number().int().min(30).max(300).default(60),
    /** Number of departure slots exposed */
    numDepartures: z.number().int().min(1).max(10).default(3),
});

export type TargetConfig = z.infer<typeof TargetConfigSchema>;

export const ConfigSchema = z.object({
    debug: z.boolean().default(false),
    logLevel: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
    api: z
        .object({
            baseUrl: z.string().url().default('https://transport.integration.sl.se/v1'),
            /** Request timeout (ms) */
            timeout: z.number().positive().default(10000),
            retryAttempts: z.number().int().positive().default(2),
            /** Initial retry delay (ms), doubled per attempt */
            retryDelay: z.number().nonnegative().default(1000),
        })
        .default({}),
    display: z
        .object({
            /** IANA zone used for clock strings (host zone when omitted) */
            timeZone: z.string().optional(),
            nowLabel: z.string().min(1).default('Nu'),
            agency: z.string().default('SL'),
        })
        .default({}),
    targets: z.array(TargetConfigSchema).default([]),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigValidationError extends Error {
    constructor(
        message: string,
        public errors: z.ZodError
    ) {
        super(message);
        this.name = 'ConfigValidationError';
    }
}
