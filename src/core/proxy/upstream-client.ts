import { TIMEOUTS } from '../../constants/index.js';
import { UpstreamUnreachableError, describeError } from '../../utils/errors.js';
import { isPlainObject } from '../../utils/guards.js';
import { logger } from '../../utils/logger.js';
import { normalizeDistName } from '../../utils/package-name.js';
import type { UpstreamIndex } from './route-table.js';

export interface UpstreamFile {
  filename: string;
  /** Absolute URL without fragment */
  url: string;
  sha256?: string;
  yanked: boolean;
  /** Derived from the file name, null when it cannot be */
  version: string | null;
}

export interface UpstreamProject {
  indexUrl: string;
  name: string;
  files: UpstreamFile[];
}

export interface UpstreamClient {
  /** null when the index does not know the project */
  fetchProject(index: UpstreamIndex, name: string): Promise<UpstreamProject | null>;
  fetchFile(url: string): Promise<Uint8Array>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

const SIMPLE_JSON = 'application/vnd.pypi.simple.v1+json';
const ARCHIVE_SUFFIXES = ['.tar.gz', '.tar.bz2', '.tgz', '.zip', '.tar'];

/**
 * HTTP access to upstream indexes with a bounded timeout per request.
 * Network errors, timeouts, unreadable bodies and 5xx answers raise UpstreamUnreachableError.
 */
export class HttpUpstreamClient implements UpstreamClient {
  constructor(
    private readonly timeoutMs: number = TIMEOUTS.UPSTREAM_MS,
    private readonly fetchFn: FetchFn = (input, init) => fetch(input, init)
  ) {}

  async fetchProject(index: UpstreamIndex, name: string): Promise<UpstreamProject | null> {
    const normalized = normalizeDistName(name);
    if (index.kind === 'legacy-json') {
      const url = `${index.url}/${normalized}/json`;
      const files = await this.request(index.url, url, 'application/json', async response =>
        parseLegacyJson(await response.json(), normalized, url)
      );
      return files ? { indexUrl: index.url, name: normalized, files } : null;
    }

    const url = `${index.url}/${normalized}/`;
    const files = await this.request(index.url, url, `${SIMPLE_JSON}, text/html;q=0.1`, async response => {
      const pageUrl = response.url || url;
      return (response.headers.get('content-type') ?? '').includes('json')
        ? parseSimpleJson(await response.json(), normalized, pageUrl)
        : parseSimpleHtml(await response.text(), normalized, pageUrl);
    });
    return files ? { indexUrl: index.url, name: normalized, files } : null;
  }

  async fetchFile(url: string): Promise<Uint8Array> {
    const content = await this.request(url, url, '*/*', async response => new Uint8Array(await response.arrayBuffer()));
    if (!content) {
      throw new UpstreamUnreachableError(url, 'file not found');
    }
    return content;
  }

  /**
   * GET `url` and read its body with `read`, all within one timeout.
   * null on 4xx; every other failure is an UpstreamUnreachableError.
   */
  private async request<T>(
    indexUrl: string,
    url: string,
    accept: string,
    read: (response: Response) => Promise<T>
  ): Promise<T | null> {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    // The body may stall after the headers, so the deadline races the whole exchange
    const deadline = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        reject(new UpstreamUnreachableError(indexUrl, `timed out after ${this.timeoutMs} ms`));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.exchange(indexUrl, url, accept, controller.signal, read), deadline]);
    } catch (error) {
      if (error instanceof UpstreamUnreachableError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new UpstreamUnreachableError(indexUrl, `timed out after ${this.timeoutMs} ms`);
      }
      throw new UpstreamUnreachableError(indexUrl, describeError(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async exchange<T>(
    indexUrl: string,
    url: string,
    accept: string,
    signal: AbortSignal,
    read: (response: Response) => Promise<T>
  ): Promise<T | null> {
    logger.debug(`GET ${url}`);
    const response = await this.fetchFn(url, { headers: { Accept: accept }, signal });
    if (response.status >= 500) {
      throw new UpstreamUnreachableError(indexUrl, `HTTP ${response.status}`);
    }
    if (!response.ok) {
      logger.debug(`GET ${url} returned ${response.status}`);
      return null;
    }
    return read(response);
  }
}

/**
 * Version part of a wheel or sdist file name, or null.
 */
export function versionFromFilename(filename: string, project: string): string | null {
  if (filename.endsWith('.whl')) {
    const parts = filename.slice(0, -4).split('-');
    return parts.length >= 5 ? parts[1] : null;
  }

  const suffix = ARCHIVE_SUFFIXES.find(candidate => filename.toLowerCase().endsWith(candidate));
  if (!suffix) {
    return null;
  }
  const stem = filename.slice(0, -suffix.length);
  const normalizedProject = normalizeDistName(project);
  for (let dash = stem.indexOf('-'); dash !== -1; dash = stem.indexOf('-', dash + 1)) {
    if (normalizeDistName(stem.slice(0, dash)) === normalizedProject) {
      return stem.slice(dash + 1) || null;
    }
  }
  const last = stem.lastIndexOf('-');
  return last > 0 ? stem.slice(last + 1) : null;
}

export function parseSimpleJson(body: unknown, project: string, pageUrl: string): UpstreamFile[] {
  if (!isPlainObject(body) || !Array.isArray(body.files)) {
    return [];
  }
  const files: UpstreamFile[] = [];
  for (const entry of body.files) {
    if (!isPlainObject(entry) || typeof entry.filename !== 'string' || typeof entry.url !== 'string') {
      continue;
    }
    const hashes: Record<string, unknown> = isPlainObject(entry.hashes) ? entry.hashes : {};
    files.push({
      filename: entry.filename,
      url: resolveUrl(entry.url, pageUrl),
      sha256: typeof hashes.sha256 === 'string' ? hashes.sha256 : undefined,
      yanked: entry.yanked !== undefined && entry.yanked !== false,
      version: versionFromFilename(entry.filename, project)
    });
  }
  return files;
}

const ANCHOR_REGEX = /<a\s+([^>]*)>([^<]*)<\/a>/gi;
const ATTR_REGEX = /([a-zA-Z-]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+)))?/g;

export function parseSimpleHtml(html: string, project: string, pageUrl: string): UpstreamFile[] {
  const files: UpstreamFile[] = [];
  for (const anchor of html.matchAll(ANCHOR_REGEX)) {
    const attrs = new Map<string, string>();
    for (const attr of anchor[1].matchAll(ATTR_REGEX)) {
      attrs.set(attr[1].toLowerCase(), decodeEntities(attr[2] ?? attr[3] ?? attr[4] ?? ''));
    }
    const href = attrs.get('href');
    if (!href) {
      continue;
    }
    const absolute = new URL(href, pageUrl);
    const sha256 = absolute.hash.startsWith('#sha256=') ? absolute.hash.slice('#sha256='.length) : undefined;
    absolute.hash = '';
    const filename = decodeEntities(anchor[2].trim()) || decodeURIComponent(absolute.pathname.split('/').pop() ?? '');
    files.push({
      filename,
      url: absolute.toString(),
      sha256,
      yanked: attrs.has('data-yanked'),
      version: versionFromFilename(filename, project)
    });
  }
  return files;
}

export function parseLegacyJson(body: unknown, project: string, pageUrl: string): UpstreamFile[] {
  if (!isPlainObject(body) || !isPlainObject(body.releases)) {
    return [];
  }
  const files: UpstreamFile[] = [];
  for (const [version, releaseFiles] of Object.entries(body.releases)) {
    if (!Array.isArray(releaseFiles)) {
      continue;
    }
    for (const entry of releaseFiles) {
      if (!isPlainObject(entry) || typeof entry.url !== 'string') {
        continue;
      }
      const url = resolveUrl(entry.url, pageUrl);
      const filename = typeof entry.filename === 'string'
        ? entry.filename
        : decodeURIComponent(new URL(url).pathname.split('/').pop() ?? '');
      const digests: Record<string, unknown> = isPlainObject(entry.digests) ? entry.digests : {};
      files.push({
        filename,
        url,
        sha256: typeof digests.sha256 === 'string' ? digests.sha256 : undefined,
        yanked: entry.yanked === true,
        version: versionFromFilename(filename, project) ?? version
      });
    }
  }
  return files;
}

function resolveUrl(url: string, base: string): string {
  const absolute = new URL(url, base);
  absolute.hash = '';
  return absolute.toString();
}

function decodeEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}
