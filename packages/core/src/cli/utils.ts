/**
 * CLI Utilities: Flag parsing, formatting, color output, and HTTP helpers.
 */

// ─── ANSI Color Support ──────────────────────────────────────────────────────

const ANSI_RESET = '\x1b[0m';
const ANSI_BOLD = '\x1b[1m';
const ANSI_DIM = '\x1b[2m';
const ANSI_RED = '\x1b[31m';
const ANSI_GREEN = '\x1b[32m';
const ANSI_YELLOW = '\x1b[33m';

/** Returns true when the stream supports ANSI colors and NO_COLOR is unset. */
function isTTYStream(stream: NodeJS.WritableStream): boolean {
  return !process.env.NO_COLOR && 'isTTY' in stream && stream.isTTY === true;
}

/**
 * Returns color helper functions bound to the given output stream.
 * All helpers return plain text when the stream is not a TTY
 * or when the `NO_COLOR` environment variable is set.
 */
export function colorContext(stream: NodeJS.WritableStream) {
  const enabled = isTTYStream(stream);
  const wrap = (code: string) => (text: string) => (enabled ? `${code}${text}${ANSI_RESET}` : text);
  return {
    green: wrap(ANSI_GREEN),
    red: wrap(ANSI_RED),
    yellow: wrap(ANSI_YELLOW),
    dim: wrap(ANSI_DIM),
    bold: wrap(ANSI_BOLD),
  };
}

/** Extract a --flag value pair from argv, returning value and remaining args. */
export function extractFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: string | undefined; rest: string[] } {
  const rest: string[] = [];
  let value: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if ((arg === `--${flag}` || (alias && arg === `-${alias}`)) && i + 1 < argv.length) {
      value = argv[++i];
    } else if (arg !== undefined) {
      rest.push(arg);
    }
  }
  return { value, rest };
}

/** Extract a boolean --flag from argv. */
export function extractBoolFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: boolean; rest: string[] } {
  const rest: string[] = [];
  let value = false;
  for (const arg of argv) {
    if (arg === `--${flag}` || (alias && arg === `-${alias}`)) {
      value = true;
    } else {
      rest.push(arg);
    }
  }
  return { value, rest };
}

/** Format milliseconds as a short duration, e.g. "2m 15s". */
export function formatDuration(ms: number): string {
  const seconds = Math.max(0, Math.floor(ms / 1000));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;

  const parts: string[] = [];
  if (h > 0) parts.push(`${String(h)}h`);
  if (m > 0 || h > 0) parts.push(`${String(m)}m`);
  parts.push(`${String(s)}s`);
  return parts.join(' ');
}

export interface ApiCallResult {
  ok: boolean;
  status: number;
  data: unknown;
  /** X-Request-Id the server answered with */
  requestId: string | null;
}

/** Wrapper around fetch for CLI HTTP calls. */
export async function apiCall(
  baseUrl: string,
  path: string,
  options: {
    method?: string;
    token?: string;
  } = {}
): Promise<ApiCallResult> {
  const url = `${baseUrl.replace(/\/+$/, '')}${path}`;
  const headers: Record<string, string> = {
    Accept: 'application/json',
  };

  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }

  let response: Response;
  try {
    response = await fetch(url, { method: options.method ?? 'GET', headers });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    if (msg.includes('ECONNREFUSED') || msg.includes('fetch failed')) {
      throw new Error(`Connection refused: ${baseUrl} (is the server running?)`);
    }
    throw new Error(`HTTP request failed: ${msg}`);
  }

  let data: unknown;
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    data = await response.json();
  } else {
    data = await response.text();
  }

  return {
    ok: response.ok,
    status: response.status,
    data,
    requestId: response.headers.get('x-request-id'),
  };
}
