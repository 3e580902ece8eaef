import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { FetchFn, HttpUpstreamClient, versionFromFilename } from '../../../src/core/proxy/upstream-client.js';
import type { UpstreamIndex } from '../../../src/core/proxy/route-table.js';
import { UpstreamUnreachableError } from '../../../src/utils/errors.js';

const simpleIndex: UpstreamIndex = { url: 'https://idx.example/simple', kind: 'simple', legacyArchives: false };
const legacyIndex: UpstreamIndex = { url: 'https://micropython.org/pi', kind: 'legacy-json', legacyArchives: true };

interface Recorded {
  url: string;
  accept: string;
}

function respondWith(response: () => Response, recorded: Recorded[] = []): FetchFn {
  return async (url, init) => {
    const headers = new Headers(init?.headers);
    recorded.push({ url, accept: headers.get('accept') ?? '' });
    return response();
  };
}

describe('HttpUpstreamClient', () => {
  it('reads the JSON simple API and resolves relative file URLs', async () => {
    const recorded: Recorded[] = [];
    const body = {
      files: [
        { filename: 'foo-1.0-py3-none-any.whl', url: '../../packages/foo-1.0-py3-none-any.whl', hashes: { sha256: 'abc' } },
        { filename: 'foo-0.9.tar.gz', url: 'https://files.example/foo-0.9.tar.gz', hashes: {}, yanked: 'broken build' }
      ]
    };
    const client = new HttpUpstreamClient(1000, respondWith(() => new Response(JSON.stringify(body), {
      headers: { 'content-type': 'application/vnd.pypi.simple.v1+json' }
    }), recorded));

    const project = await client.fetchProject(simpleIndex, 'Foo');

    assert.deepEqual(recorded, [{
      url: 'https://idx.example/simple/foo/',
      accept: 'application/vnd.pypi.simple.v1+json, text/html;q=0.1'
    }]);
    assert.deepEqual(project, {
      indexUrl: 'https://idx.example/simple',
      name: 'foo',
      files: [
        { filename: 'foo-1.0-py3-none-any.whl', url: 'https://idx.example/packages/foo-1.0-py3-none-any.whl', sha256: 'abc', yanked: false, version: '1.0' },
        { filename: 'foo-0.9.tar.gz', url: 'https://files.example/foo-0.9.tar.gz', sha256: undefined, yanked: true, version: '0.9' }
      ]
    });
  });

  it('falls back to HTML anchors with hash fragments and yank markers', async () => {
    const html = '<html><body>\n<a href="/files/Foo_Bar-2.0.tar.gz#sha256=deadbeef" data-yanked="">Foo_Bar-2.0.tar.gz</a><br/>\n</body></html>';
    const client = new HttpUpstreamClient(1000, respondWith(() => new Response(html, {
      headers: { 'content-type': 'text/html' }
    })));

    const project = await client.fetchProject(simpleIndex, 'foo-bar');

    assert.deepEqual(project?.files, [{
      filename: 'Foo_Bar-2.0.tar.gz',
      url: 'https://idx.example/files/Foo_Bar-2.0.tar.gz',
      sha256: 'deadbeef',
      yanked: true,
      version: '2.0'
    }]);
  });

  it('reads release files from the legacy JSON API', async () => {
    const recorded: Recorded[] = [];
    const body = {
      info: { name: 'logging' },
      releases: { '0.3': [{ url: 'https://micropython.org/pi/logging/logging-0.3.tar.gz', digests: { sha256: 'f00d' } }] }
    };
    const client = new HttpUpstreamClient(1000, respondWith(() => Response.json(body), recorded));

    const project = await client.fetchProject(legacyIndex, 'logging');

    assert.equal(recorded[0].url, 'https://micropython.org/pi/logging/json');
    assert.deepEqual(project?.files, [{
      filename: 'logging-0.3.tar.gz',
      url: 'https://micropython.org/pi/logging/logging-0.3.tar.gz',
      sha256: 'f00d',
      yanked: false,
      version: '0.3'
    }]);
  });

  it('returns null for projects the index does not know', async () => {
    const client = new HttpUpstreamClient(1000, respondWith(() => new Response('missing', { status: 404 })));
    assert.equal(await client.fetchProject(simpleIndex, 'nope'), null);
  });

  it('treats server errors as an unreachable index', async () => {
    const client = new HttpUpstreamClient(1000, respondWith(() => new Response('down', { status: 503 })));
    await assert.rejects(client.fetchProject(simpleIndex, 'foo'), {
      name: 'UpstreamUnreachableError',
      message: 'Index https://idx.example/simple is unreachable: HTTP 503'
    });
  });

  it('treats network errors as an unreachable index', async () => {
    const client = new HttpUpstreamClient(1000, async () => {
      throw new TypeError('fetch failed');
    });
    await assert.rejects(client.fetchProject(simpleIndex, 'foo'), UpstreamUnreachableError);
  });

  it('gives up after the timeout', async () => {
    const hanging: FetchFn = (_url, init) => new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => {
        const error = new Error('aborted');
        error.name = 'AbortError';
        reject(error);
      });
    });
    const client = new HttpUpstreamClient(10, hanging);

    await assert.rejects(client.fetchProject(simpleIndex, 'foo'), {
      message: 'Index https://idx.example/simple is unreachable: timed out after 10 ms'
    });
  });

  it('gives up when the body stalls after the headers', async () => {
    const stalled = () => new Response(
      new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"files": ['));
        }
      }),
      { headers: { 'content-type': 'application/vnd.pypi.simple.v1+json' } }
    );
    const client = new HttpUpstreamClient(20, respondWith(stalled));

    await assert.rejects(client.fetchProject(simpleIndex, 'foo'), {
      name: 'UpstreamUnreachableError',
      message: 'Index https://idx.example/simple is unreachable: timed out after 20 ms'
    });
  });

  it('treats an unreadable body as an unreachable index', async () => {
    const broken = () => new Response('{"files": [', { headers: { 'content-type': 'application/vnd.pypi.simple.v1+json' } });
    const client = new HttpUpstreamClient(1000, respondWith(broken));

    await assert.rejects(client.fetchProject(simpleIndex, 'foo'), (error: unknown) => {
      assert.ok(error instanceof UpstreamUnreachableError);
      assert.ok(error.message.startsWith('Index https://idx.example/simple is unreachable: '));
      return true;
    });
  });

  it('downloads file bytes', async () => {
    const client = new HttpUpstreamClient(1000, respondWith(() => new Response(new Uint8Array([1, 2, 3]))));
    assert.deepEqual([...await client.fetchFile('https://files.example/a.whl')], [1, 2, 3]);
  });
});

describe('versionFromFilename', () => {
  it('takes the second field of a wheel name', () => {
    assert.equal(versionFromFilename('pkg-1.0-py3-none-any.whl', 'pkg'), '1.0');
    assert.equal(versionFromFilename('broken.whl', 'pkg'), null);
  });

  it('splits sdists at the project name even when it contains dashes', () => {
    assert.equal(versionFromFilename('micropython-foo-1.2.3.tar.gz', 'micropython-foo'), '1.2.3');
    assert.equal(versionFromFilename('other-2.0.zip', 'foo'), '2.0');
  });

  it('ignores unknown archive types', () => {
    assert.equal(versionFromFilename('setup.exe', 'setup'), null);
  });
});
