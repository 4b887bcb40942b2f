import { z } from 'zod';
import type { VisualizationType } from './types.js';
import { ReportValidationError } from './types.js';

const CATEGORIES = ['statistical', 'pattern', 'anomaly', 'trend', 'relationship'] as const;

const SEVERITIES = ['low', 'medium', 'high'] as const;

const VISUALIZATION_TYPES = [
    'network',
    '3d_scatter',
    '3d_surface',
    '3d_line',
    '3d_bar',
    '3d_mesh',
    'generic_scatter',
] as const satisfies readonly VisualizationType[];

const DataPointSchema = z.union([z.number(), z.string(), z.boolean(), z.array(z.number())]);

const InsightJsonSchema = z.object({
    category: z.enum(CATEGORIES),
    title: z.string().min(1),
    description: z.string().min(1),
    confidence: z.number().min(0).max(1),
    severity: z.enum(SEVERITIES),
    data_points: z.record(z.string(), DataPointSchema),
    recommendation: z.string().nullable(),
});

const DataSummaryJsonSchema = z.object({
    total_records: z.number().int().nonnegative(),
    total_columns: z.number().int().nonnegative(),
    numeric_columns: z.number().int().nonnegative(),
    categorical_columns: z.number().int().nonnegative(),
    missing_values: z.number().int().nonnegative(),
    missing_percentage: z.number().min(0).max(100),
    memory_usage_mb: z.number().nonnegative(),
});

export const ReportJsonSchema = z.object({
    timestamp: z.string().datetime(),
    visualization_type: z.enum(VISUALIZATION_TYPES),
    data_summary: DataSummaryJsonSchema,
    insights: z.array(InsightJsonSchema),
    patterns: z.array(z.string()),
    anomalies: z.array(z.string()),
    trends: z.array(z.string()),
    recommendations: z.array(z.string()).max(5),
    summary: z.string(),
    key_findings: z.array(z.string()).max(5),
});

export type ReportJson = z.infer<typeof ReportJsonSchema>;
export type InsightJson = z.infer<typeof InsightJsonSchema>;
export type DataSummaryJson = z.infer<typeof DataSummaryJsonSchema>;

function formatZodErrors(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

function parseAndValidate<T>(raw: string, schema: z.ZodSchema<T>, errorContext: string): T {
    let parsed: unknown;

    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new ReportValidationError(`Invalid JSON in ${errorContext}`, raw, [
            'Failed to parse JSON',
        ]);
    }

    const result = schema.safeParse(parsed);

    if (!result.success) {
        throw new ReportValidationError(
            `${errorContext} validation failed`,
            raw,
            formatZodErrors(result.error)
        );
    }

    return result.data;
}

/** Read back an exported analytics report */
export function parseReportJson(raw: string): ReportJson {
    return parseAndValidate(raw, ReportJsonSchema, 'Analytics report');
}
