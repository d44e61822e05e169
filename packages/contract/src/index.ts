import { z } from 'zod';

export const HealthCheckSchema = z.object({
    status: z.string(),
    timestamp: z.string(),
    db: z.object({
        connected: z.boolean(),
        latencyMs: z.number(),
    }),
});

export type HealthCheckDto = z.infer<typeof HealthCheckSchema>;

// Debug bar (query profiler snapshot + widget metadata)
export * from './debugbar.schema.js';
