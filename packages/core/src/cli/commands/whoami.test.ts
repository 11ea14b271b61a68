import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { whoamiCommand } from './whoami.js';

function createStreams() {
  let stdoutBuf = '';
  let stderrBuf = '';
  const stdout = {
    write: (s: string) => {
      stdoutBuf += s;
      return true;
    },
  } as unknown as NodeJS.WritableStream;
  const stderr = {
    write: (s: string) => {
      stderrBuf += s;
      return true;
    },
  } as unknown as NodeJS.WritableStream;
  return { stdout, stderr, getStdout: () => stdoutBuf, getStderr: () => stderrBuf };
}

function stubResponse(body: unknown, status = 200, requestId = 'req-7') {
  const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
    new Response(JSON.stringify(body), {
      status,
      headers: { 'content-type': 'application/json', 'x-request-id': requestId },
    })
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('whoami command', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env['KEYGATE_TOKEN'];
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.unstubAllGlobals();
  });

  it('should require a token', async () => {
    const { stdout, stderr, getStderr } = createStreams();
    const code = await whoamiCommand.run({ argv: [], stdout, stderr });
    expect(code).toBe(1);
    expect(getStderr()).toBe('Error: no token given (use --token or set KEYGATE_TOKEN)\n');
  });

  it('should print the principal for an accepted token', async () => {
    const fetchMock = stubResponse({
      subject: 'user-42',
      username: 'alice',
      email: null,
      roles: ['admin', 'viewer'],
      issuer: 'https://idp.test/realms/main',
    });

    const { stdout, stderr, getStdout } = createStreams();
    const code = await whoamiCommand.run({
      argv: ['--token', 'test-token', '--prefix', '/v2'],
      stdout,
      stderr,
    });

    expect(code).toBe(0);
    expect(fetchMock).toHaveBeenCalledWith('http://127.0.0.1:3000/v2/protected', {
      method: 'GET',
      headers: { Accept: 'application/json', Authorization: 'Bearer test-token' },
    });
    expect(getStdout()).toBe(
      '\n  Subject:   user-42\n' +
        '  Username:  alice\n' +
        '  Email:     -\n' +
        '  Issuer:    https://idp.test/realms/main\n' +
        '  Roles:     admin, viewer\n\n'
    );
  });

  it('should read the token from KEYGATE_TOKEN', async () => {
    process.env['KEYGATE_TOKEN'] = 'env-token';
    const fetchMock = stubResponse({
      subject: 'user-1',
      username: null,
      email: null,
      roles: [],
      issuer: 'https://idp.test/realms/main',
    });

    const { stdout, stderr, getStdout } = createStreams();
    const code = await whoamiCommand.run({ argv: ['--json'], stdout, stderr });

    expect(code).toBe(0);
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer env-token',
    });
    expect(JSON.parse(getStdout()).subject).toBe('user-1');
  });

  it('should show the rejection kind and request id', async () => {
    stubResponse(
      {
        error: 'Unauthorized',
        message: 'Token has expired',
        statusCode: 401,
        kind: 'ExpiredToken',
        correlationId: 'req-7',
      },
      401
    );

    const { stdout, stderr, getStderr } = createStreams();
    const code = await whoamiCommand.run({ argv: ['--token', 'test-token'], stdout, stderr });

    expect(code).toBe(1);
    expect(getStderr()).toBe('Rejected (401) ExpiredToken: Token has expired [request req-7]\n');
  });
});
