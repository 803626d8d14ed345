/**
 * DASHBOARD ROUTES — HTTP Endpoints
 *
 * Every endpoint reads through the cached query layer, so a viewer polling
 * every REFRESH_INTERVAL_MS costs at most one store read per cache TTL.
 * A failed read surfaces as 503 DATA_UNAVAILABLE; an empty store is a 200.
 */

import type { FastifyInstance } from 'fastify';
import {
  confidenceDistribution,
  faultFrequency,
  liveFeed,
  locationHistogram,
  sensorTimeSeries,
  summarize,
} from '../analytics/analytics.service.js';
import { DEFAULT_CONFIDENCE_BINS, DEFAULT_LIVE_FEED_LIMIT } from '../analytics/analytics.types.js';
import { SENSOR_CHANNELS } from '../verdicts/contracts/verdict.types.js';
import type { VerdictQueryService } from '../verdicts/services/verdict.query.service.js';

export interface DashboardRouteDeps {
  query: VerdictQueryService;
  refreshIntervalMs: number;
}

function intParam(raw: string | undefined, fallback: number): number {
  return raw === undefined ? fallback : parseInt(raw, 10);
}

export async function registerDashboardRoutes(app: FastifyInstance, deps: DashboardRouteDeps): Promise<void> {
  const prefix = '/api/dashboard';
  const { query } = deps;

  /**
   * Polling parameters for the viewer
   */
  app.get(`${prefix}/config`, async () => ({
    ok: true,
    data: {
      refreshIntervalMs: deps.refreshIntervalMs,
      cache: query.stats(),
      channels: SENSOR_CHANNELS,
    },
  }));

  /**
   * Most recent verdicts
   */
  app.get<{ Querystring: { limit?: string } }>(`${prefix}/live`, async (req) => {
    const snapshot = await query.fetchSnapshot();
    const limit = intParam(req.query.limit, DEFAULT_LIVE_FEED_LIMIT);

    return {
      ok: true,
      data: {
        capturedAt: snapshot.capturedAt,
        total: snapshot.verdicts.length,
        rows: liveFeed(snapshot.verdicts, limit),
      },
    };
  });

  /**
   * Fault frequency + confidence distribution + summary
   */
  app.get<{ Querystring: { bins?: string } }>(`${prefix}/analytics`, async (req) => {
    const snapshot = await query.fetchSnapshot();
    const bins = intParam(req.query.bins, DEFAULT_CONFIDENCE_BINS);

    return {
      ok: true,
      data: {
        capturedAt: snapshot.capturedAt,
        faultFrequency: faultFrequency(snapshot.verdicts),
        confidenceDistribution: confidenceDistribution(snapshot.verdicts, bins),
        summary: summarize(snapshot.verdicts),
      },
    };
  });

  app.get(`${prefix}/sensors`, async () => ({
    ok: true,
    data: { channels: SENSOR_CHANNELS },
  }));

  /**
   * One channel over time, in snapshot order (newest first)
   */
  app.get<{ Params: { channel: string } }>(`${prefix}/sensors/:channel`, async (req) => {
    const verdicts = await query.fetchAll();
    return {
      ok: true,
      data: sensorTimeSeries(verdicts, req.params.channel),
    };
  });

  app.get(`${prefix}/locations`, async () => {
    const verdicts = await query.fetchAll();
    return {
      ok: true,
      data: locationHistogram(verdicts),
    };
  });

  app.get(`${prefix}/summary`, async () => {
    const verdicts = await query.fetchAll();
    return {
      ok: true,
      data: summarize(verdicts),
    };
  });

  app.log.info('[Dashboard] Routes registered');
}
