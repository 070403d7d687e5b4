import { Hono } from 'hono';
import { FilesystemReportStorage } from '@/adapters/storage/filesystem';
import type { InspectorConfig } from '@/utils/config';

export function createHealthRoutes(config: InspectorConfig) {
  const routes = new Hono();

  routes.get('/', (c) => {
    return c.json({
      status: 'healthy',
      service: 'remote-zip-inspector',
      timestamp: new Date().toISOString(),
    });
  });

  routes.get('/ready', async (c) => {
    // Check the report directory can be created
    try {
      await new FilesystemReportStorage(config.report.outputDir).ensure();

      return c.json({
        status: 'ready',
        checks: {
          reports: 'ok',
        },
      });
    } catch (error) {
      return c.json(
        {
          status: 'not ready',
          checks: {
            reports: 'failed',
            error: String(error),
          },
        },
        503
      );
    }
  });

  return routes;
}
