import { Hono } from 'hono';
import { buildFolderTree, listFolder } from '@/services/zip/folder-tree';
import type { SessionStore } from '@/services/zip/session-store';
import { isPathSafe, normalizeFolderPath } from '@/utils/zip-utils';
import { badRequest, requireArchiveUrl, requireString } from './validation';

/**
 * Archive structure lookups; the first request for a URL runs the inspection.
 */
export function createInspectRoutes(sessions: SessionStore) {
  const routes = new Hono();

  routes.get('/', async (c) => {
    const location = requireArchiveUrl(c.req.query('url'));
    const session = await sessions.get(location);

    return c.json({
      location: session.location,
      contentLength: session.contentLength,
      entryCount: session.structure.count,
      totalSize: session.structure.totalSize,
      window: session.window,
      cachedAt: session.structure.cachedAt,
      entries: session.structure.entries(),
    });
  });

  // Drop the cached structure, e.g. after the remote archive was replaced
  routes.delete('/', (c) => {
    const location = requireArchiveUrl(c.req.query('url'));

    return c.json({ location, forgotten: sessions.forget(location) });
  });

  routes.get('/tree', async (c) => {
    const location = requireArchiveUrl(c.req.query('url'));
    const path = c.req.query('path') ?? '';

    if (!isPathSafe(path)) {
      throw badRequest('Invalid path');
    }

    const session = await sessions.get(location);
    const tree = buildFolderTree(session.structure.entries());
    const folder = normalizeFolderPath(path);

    return c.json({
      path: `/${folder}`,
      items: listFolder(tree, folder),
    });
  });

  routes.get('/size', async (c) => {
    const location = requireArchiveUrl(c.req.query('url'));
    const name = requireString('name', c.req.query('name'));
    const session = await sessions.get(location);

    return c.json({ name, size: session.structure.sizeOf(name) });
  });

  return routes;
}
