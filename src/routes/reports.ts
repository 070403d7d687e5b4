import { Hono } from 'hono';
import { generateReport } from '@/services/report/pipeline';
import type { SessionStore } from '@/services/zip/session-store';
import { isReportFormat } from '@/types/report';
import type { InspectorConfig } from '@/utils/config';
import { badRequest, requireArchiveUrl } from './validation';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Generate size reports into the configured output directory
 */
export function createReportRoutes(sessions: SessionStore, config: InspectorConfig) {
  const routes = new Hono();

  routes.post('/', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw badRequest('Request body must be JSON');
    }
    if (!isRecord(body)) {
      throw badRequest('Request body must be a JSON object');
    }

    const location = requireArchiveUrl(body.url);
    const format = body.format ?? 'text';
    if (!isReportFormat(format)) {
      throw badRequest('format must be "text" or "csv"');
    }
    const combine = body.combine ?? false;
    if (typeof combine !== 'boolean') {
      throw badRequest('combine must be a boolean');
    }

    const session = await sessions.get(location);
    const result = await generateReport(session.structure.entries(), {
      format,
      outputDir: config.report.outputDir,
      combine,
      shardSize: config.report.shardSize,
      concurrency: config.report.concurrency,
    });

    return c.json({
      location,
      format,
      outputDir: result.outputDir,
      shards: result.shards.map(({ range, file }) => ({ range, file })),
      combined: result.combined,
      cleanup: result.cleanup && {
        deleted: result.cleanup.deleted.length,
        failures: result.cleanup.failures.map((failure) => failure.message),
      },
    });
  });

  return routes;
}
