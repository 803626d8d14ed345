/**
 * REPORT ROUTES
 *
 * POST /api/reports — compile from the cached snapshot, served as an attachment
 */

import type { FastifyInstance } from 'fastify';
import type { Clock } from '../../common/host.deps.js';
import type { VerdictQueryService } from '../verdicts/services/verdict.query.service.js';
import { compileReport } from './report.compiler.js';

export interface ReportRouteDeps {
  query: VerdictQueryService;
  clock: Clock;
}

export async function registerReportRoutes(app: FastifyInstance, deps: ReportRouteDeps): Promise<void> {
  app.post('/api/reports', async (_req, reply) => {
    const verdicts = await deps.query.fetchAll();
    const report = compileReport(verdicts, deps.clock.utcNow());

    return reply
      .header('Content-Disposition', `attachment; filename="${report.fileName}"`)
      .send({ ok: true, data: report });
  });

  app.log.info('[Report] Routes registered');
}
