/**
 * Health History API Routes
 *
 * Thin HTTP surface over a HistoryEngine for chart views.
 *
 * Wire format for a series point: { t: bucketStart (epoch ms), v: value | null, n: sampleCount }.
 *
 * @module server/routes/history
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { HistoryEngine } from '../history/HistoryEngine';
import { HistoryError, extractHistoryErrorMessage } from '../history/errors';
import type { SeriesResultMap } from '../history/types';
import logger from '../utils/logger';

/** Upper bound on ?points= so one request cannot ask for an unbounded series */
const MAX_POINTS = 5_000;

// ============================================================================
// QUERY VALIDATION
// ============================================================================

/** Accepts epoch milliseconds or any Date.parse-able string (ISO 8601) */
const instantParam = z.string().trim().min(1).transform((raw, ctx) => {
    const ms = /^-?\d+$/.test(raw) ? Number(raw) : Date.parse(raw);
    if (!Number.isFinite(ms)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid instant: ${raw}` });
        return z.NEVER;
    }
    return ms;
});

const seriesQuerySchema = z.object({
    metrics: z.string()
        .transform(raw => raw.split(',').map(id => id.trim()).filter(id => id.length > 0))
        .refine(ids => ids.length > 0, 'At least one metric is required'),
    start: instantParam,
    end: instantParam,
    points: z.coerce.number().int().positive().max(MAX_POINTS).optional(),
});

// ============================================================================
// HELPERS
// ============================================================================

interface WirePoint {
    t: number;
    v: number | null;
    n: number;
}

function toWire(series: SeriesResultMap): Record<string, WirePoint[]> {
    const wire: Record<string, WirePoint[]> = {};
    for (const [metric, points] of Object.entries(series)) {
        wire[metric] = points.map(point => ({ t: point.bucketStart, v: point.value, n: point.sampleCount }));
    }
    return wire;
}

function sendError(res: Response, status: number, code: string, message: string): void {
    res.status(status).json({
        success: false,
        error: { code, message },
    });
}

function sendQueryError(res: Response, error: unknown): void {
    if (error instanceof HistoryError) {
        switch (error.code) {
            case 'UNKNOWN_METRIC':
            case 'INVALID_RANGE':
            case 'INVALID_CONFIG':
                sendError(res, 400, error.code, error.message);
                return;
            case 'DATA_SOURCE_UNAVAILABLE':
                logger.warn(`[HistoryRoutes] ${error.message}`);
                sendError(res, 503, error.code, 'Health data is temporarily unavailable');
                return;
        }
    }

    logger.error(`[HistoryRoutes] Query failed: ${extractHistoryErrorMessage(error)}`);
    sendError(res, 500, 'QUERY_ERROR', 'Failed to query health history');
}

// ============================================================================
// ROUTER
// ============================================================================

export function createHistoryRouter(engine: HistoryEngine): Router {
    const router = Router();

    /**
     * GET /metrics
     * Catalog listing for chart legends and pickers.
     */
    router.get('/metrics', (_req: Request, res: Response) => {
        res.json({
            success: true,
            metrics: engine.describeMetrics(),
        });
    });

    /**
     * GET /cache/stats
     * Result cache counters.
     */
    router.get('/cache/stats', (_req: Request, res: Response) => {
        res.json({
            success: true,
            cache: engine.getCacheStats(),
        });
    });

    /**
     * GET /series?metrics=heartRate,steps&start=...&end=...&points=...
     * Downsampled series for each metric over [start, end).
     */
    router.get('/series', async (req: Request, res: Response): Promise<void> => {
        const parsed = seriesQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            const message = parsed.error.issues
                .map(issue => `${issue.path.join('.') || 'query'}: ${issue.message}`)
                .join('; ');
            sendError(res, 400, 'INVALID_PARAM', message);
            return;
        }

        const { metrics, start, end, points } = parsed.data;
        const options = { pointBudget: points };

        try {
            const series = await engine.aggregateHistoricalData(metrics, start, end, options);
            res.json({
                success: true,
                range: { start, end },
                resolution: engine.resolutionFor(start, end, options),
                series: toWire(series),
            });
        } catch (error) {
            sendQueryError(res, error);
        }
    });

    return router;
}
