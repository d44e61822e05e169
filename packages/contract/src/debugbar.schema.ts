import { z } from 'zod';

// ── Recorded SQL statement ───────────────────────────────────────────
// Field names follow the SQL queries widget wire format.
export const StatementSchema = z.object({
    sql: z.string(),
    is_success: z.boolean(),
    /** Seconds */
    duration: z.number().nonnegative(),
    duration_str: z.string(),
    /** Bytes */
    memory: z.number().nonnegative(),
    memory_str: z.string(),
    /** `basename:line` of the attributed caller, null when none was found */
    caller: z.string().nullable(),
    /** `Called X in Y on line Z`, null when no caller was found */
    caller_str: z.string().nullable(),
});
export type StatementDto = z.infer<typeof StatementSchema>;

// ── Collector snapshot (collect()) ───────────────────────────────────
export const QueriesSnapshotSchema = z.object({
    nb_statements: z.number().int().nonnegative(),
    nb_failed_statements: z.number().int().nonnegative(),
    accumulated_duration: z.number().nonnegative(),
    accumulated_duration_str: z.string(),
    peak_memory_usage: z.number().nonnegative(),
    peak_memory_usage_str: z.string(),
    statements: z.array(StatementSchema),
});
export type QueriesSnapshotDto = z.infer<typeof QueriesSnapshotSchema>;

// ── GET /debugbar ────────────────────────────────────────────────────
export const DebugBarDataSchema = z.object({
    name: z.string(),
    data: QueriesSnapshotSchema,
});
export type DebugBarDataDto = z.infer<typeof DebugBarDataSchema>;

// ── Widget / asset metadata ──────────────────────────────────────────
export const WidgetSchema = z.object({
    icon: z.string().optional(),
    widget: z.string().optional(),
    map: z.string(),
    default: z.union([z.string(), z.number()]),
});
export type WidgetDto = z.infer<typeof WidgetSchema>;

export const WidgetAssetsSchema = z.object({
    css: z.string(),
    js: z.string(),
});
export type WidgetAssetsDto = z.infer<typeof WidgetAssetsSchema>;

/**
 * GET /debugbar/widgets
 * Describes how a UI should render the collected data.
 */
export const DebugBarWidgetsSchema = z.object({
    widgets: z.record(z.string(), WidgetSchema),
    assets: WidgetAssetsSchema,
});
export type DebugBarWidgetsDto = z.infer<typeof DebugBarWidgetsSchema>;
