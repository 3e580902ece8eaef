import express, { Request, Response, NextFunction } from 'express';
import { createServer } from 'http';
import { describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { normalizeDistName } from '../../utils/package-name.js';
import { latestVersion } from '../../utils/version.js';
import { buildDummyWheel, dummyWheelFilename } from './dummy-wheel.js';
import { LEGACY_ARCHIVE_SUFFIX, rewriteLegacySdist } from './legacy-sdist.js';
import { resolveProject, ResolvedProject } from './project-resolver.js';
import { isDummyPackage, ProxyRouteTable } from './route-table.js';
import type { UpstreamClient } from './upstream-client.js';

export interface ProxyServerOptions {
  table: ProxyRouteTable;
  client: UpstreamClient;
  host?: string;
  /** 0 picks an ephemeral port */
  port?: number;
}

export interface ProxyServerHandle {
  /** Base URL without trailing slash */
  url: string;
  shutdown(): Promise<void>;
}

/**
 * A link in a rewritten listing. `href` is a path on the proxy.
 */
interface ListedFile {
  filename: string;
  href: string;
  version: string | null;
  sha256?: string;
  yanked: boolean;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

export function encodeUrlToken(url: string): string {
  return Buffer.from(url, 'utf8').toString('base64url');
}

/**
 * Upstream URL carried by a file token; only http(s) URLs are accepted.
 */
export function decodeUrlToken(token: string): string | null {
  let url: URL;
  try {
    url = new URL(Buffer.from(token, 'base64url').toString('utf8'));
  } catch {
    return null;
  }
  return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : null;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function listFiles(project: ResolvedProject): ListedFile[] {
  if (project.kind === 'dummy') {
    return project.versions.map(version => {
      const filename = dummyWheelFilename(project.name, version);
      return {
        filename,
        href: `/dummy/${encodeURIComponent(project.name)}/${encodeURIComponent(version)}/${encodeURIComponent(filename)}`,
        version,
        yanked: false
      };
    });
  }

  return project.files.map(file => {
    const legacy = project.index.legacyArchives && file.filename.endsWith(LEGACY_ARCHIVE_SUFFIX);
    const kind = legacy ? 'legacy' : 'direct';
    return {
      filename: file.filename,
      href: `/files/${kind}/${encodeUrlToken(file.url)}/${encodeURIComponent(file.filename)}`,
      version: file.version,
      // Rewritten archives no longer match the upstream digest
      sha256: legacy ? undefined : file.sha256,
      yanked: file.yanked
    };
  });
}

function renderListing(name: string, files: ListedFile[]): string {
  const links = files.map(file => {
    const href = file.sha256 ? `${file.href}#sha256=${file.sha256}` : file.href;
    const yanked = file.yanked ? ' data-yanked=""' : '';
    return `    <a href="${escapeHtml(href)}"${yanked}>${escapeHtml(file.filename)}</a><br/>`;
  });
  return [
    '<!DOCTYPE html>',
    '<html>',
    `  <head><title>Links for ${escapeHtml(name)}</title></head>`,
    '  <body>',
    `    <h1>Links for ${escapeHtml(name)}</h1>`,
    ...links,
    '  </body>',
    '</html>',
    ''
  ].join('\n');
}

function renderJson(name: string, files: ListedFile[], baseUrl: string) {
  const releases: Record<string, Array<{ filename: string; url: string; digests: { sha256?: string }; yanked: boolean }>> = {};
  for (const file of files) {
    if (file.version === null) {
      continue;
    }
    (releases[file.version] ??= []).push({
      filename: file.filename,
      url: baseUrl + file.href,
      digests: file.sha256 ? { sha256: file.sha256 } : {},
      yanked: file.yanked
    });
  }
  return {
    info: { name, version: latestVersion(Object.keys(releases), true) },
    releases
  };
}

function notFound(res: Response): void {
  if (!res.headersSent) {
    res.status(404).type('text/plain').send('Not Found');
  }
}

/**
 * Every failure turns into a 404 so that pip's own error reporting applies.
 */
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, _next: NextFunction): void => {
    handler(req, res).catch(error => {
      logger.warn(`Proxy request ${req.path} failed: ${describeError(error)}`);
      notFound(res);
    });
  };
}

export function createProxyApp(table: ProxyRouteTable, client: UpstreamClient): express.Application {
  const app = express();
  app.disable('x-powered-by');

  app.get('/', (_req, res) => {
    res.type('text/html').send('<!DOCTYPE html>\n<html><body><h1>pipbridge proxy index</h1></body></html>\n');
  });

  app.get('/:project/', route(async (req, res) => {
    const project = await resolveProject(table, client, req.params.project);
    if (!project) {
      notFound(res);
      return;
    }
    res.type('text/html').send(renderListing(project.name, listFiles(project)));
  }));

  app.get('/:project/json', route(async (req, res) => {
    const project = await resolveProject(table, client, req.params.project);
    if (!project) {
      notFound(res);
      return;
    }
    res.json(renderJson(project.name, listFiles(project), `${req.protocol}://${req.get('host') ?? ''}`));
  }));

  app.get('/files/direct/:token/:filename', route(async (req, res) => {
    const url = decodeUrlToken(req.params.token);
    if (!url) {
      notFound(res);
      return;
    }
    res.redirect(302, url);
  }));

  app.get('/files/legacy/:token/:filename', route(async (req, res) => {
    const url = decodeUrlToken(req.params.token);
    const filename = req.params.filename;
    if (!url || !filename.endsWith(LEGACY_ARCHIVE_SUFFIX)) {
      notFound(res);
      return;
    }
    const stem = filename.slice(0, -LEGACY_ARCHIVE_SUFFIX.length);
    const project = stem.includes('-') ? stem.slice(0, stem.lastIndexOf('-')) : stem;
    const archive = await client.fetchFile(url);
    const rewritten = await rewriteLegacySdist(archive, { project, filename });
    res.type('application/x-gzip').send(rewritten);
  }));

  app.get('/dummy/:project/:version/:filename', route(async (req, res) => {
    const { version, filename } = req.params;
    const name = normalizeDistName(req.params.project);
    if (!isDummyPackage(table, name) || filename !== dummyWheelFilename(name, version)) {
      notFound(res);
      return;
    }
    res.type('application/octet-stream').send(await buildDummyWheel(name, version));
  }));

  app.use((_req, res) => notFound(res));

  return app;
}

/**
 * Serve the route table over HTTP until `shutdown()`. Resolves once listening.
 */
export async function startProxyServer(options: ProxyServerOptions): Promise<ProxyServerHandle> {
  const host = options.host ?? '127.0.0.1';
  const server = createServer(createProxyApp(options.table, options.client));

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port ?? 0, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw new Error('Proxy server did not report a TCP address');
  }
  const url = `http://${host}:${address.port}`;
  logger.debug(`Proxy index listening on ${url}`);

  let closing: Promise<void> | null = null;
  return {
    url,
    shutdown(): Promise<void> {
      closing ??= new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      });
      return closing;
    }
  };
}
