/**
 * Tests for the PyPI registry client against an in-process undici MockAgent.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { createPypiClient, releasesUrl } from '../src/updater/registry-client.js';
import { FetchFailedError, UpdateErrorCode } from '../src/utils/errors.js';

const ORIGIN = 'https://pypi.test';
const INDEX = `${ORIGIN}/pypi`;

let mockAgent: MockAgent;

beforeEach(() => {
  mockAgent = new MockAgent();
  mockAgent.disableNetConnect();
});

afterEach(async () => {
  await mockAgent.close();
});

function makeClient() {
  return createPypiClient({ indexUrl: INDEX, timeoutMs: 1000, dispatcher: mockAgent });
}

// ---------------------------------------------------------------------------
// releasesUrl
// ---------------------------------------------------------------------------

describe('releasesUrl', () => {
  it('should append the package name and json suffix', () => {
    expect(releasesUrl(INDEX, 'foo')).toBe('https://pypi.test/pypi/foo/json');
  });

  it('should tolerate a trailing slash on the index', () => {
    expect(releasesUrl(`${INDEX}/`, 'foo')).toBe('https://pypi.test/pypi/foo/json');
  });
});

// ---------------------------------------------------------------------------
// fetchReleases
// ---------------------------------------------------------------------------

describe('createPypiClient().fetchReleases', () => {
  it('should return the keys of the releases mapping', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/pypi/foo/json', method: 'GET' })
      .reply(200, {
        info: { name: 'foo' },
        releases: { '1.0.0': [], '1.1.0': [{ filename: 'foo-1.1.0.tar.gz' }], '2.0.0rc1': [] },
      });

    const releases = await makeClient().fetchReleases('foo');
    expect(releases).toEqual(new Set(['1.0.0', '1.1.0', '2.0.0rc1']));
  });

  it('should keep versions whose release files are not a list', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/pypi/bar/json', method: 'GET' })
      .reply(200, { releases: { '0.1': null, '0.2': { filename: 'bar-0.2.tar.gz' }, '0.3': [] } });

    const releases = await makeClient().fetchReleases('bar');
    expect(releases).toEqual(new Set(['0.1', '0.2', '0.3']));
  });

  it('should raise FetchFailed with the status for non-success responses', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/pypi/missing/json', method: 'GET' })
      .reply(404, { message: 'Not Found' });

    await expect(makeClient().fetchReleases('missing')).rejects.toMatchObject({
      code: UpdateErrorCode.FETCH_FAILED,
      status: 404,
      url: 'https://pypi.test/pypi/missing/json',
      message: 'request for https://pypi.test/pypi/missing/json failed (HTTP 404)',
    });
  });

  it('should raise FetchFailed when the body has no releases mapping', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/pypi/odd/json', method: 'GET' })
      .reply(200, { info: { name: 'odd' } });

    await expect(makeClient().fetchReleases('odd')).rejects.toThrow(
      'request for https://pypi.test/pypi/odd/json failed (response has no releases mapping)',
    );
  });

  it('should raise FetchFailed when the body is not JSON', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/pypi/broken/json', method: 'GET' })
      .reply(200, '<html>maintenance</html>');

    await expect(makeClient().fetchReleases('broken')).rejects.toBeInstanceOf(FetchFailedError);
  });

  it('should raise FetchFailed on network errors', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/pypi/down/json', method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    const error = await makeClient()
      .fetchReleases('down')
      .then(
        () => null,
        (err: unknown) => err,
      );
    expect(error).toBeInstanceOf(FetchFailedError);
    expect(error).toMatchObject({ status: undefined });
  });

  it('should leave an injected dispatcher open on close', async () => {
    const client = makeClient();
    await client.close();

    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/pypi/foo/json', method: 'GET' })
      .reply(200, { releases: { '1.0.0': [] } });
    expect(await client.fetchReleases('foo')).toEqual(new Set(['1.0.0']));
  });
});
