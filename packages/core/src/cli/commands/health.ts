/**
 * Health Command: Check the health of a running KeyGate instance.
 */

import { z } from 'zod';
import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag, formatDuration, apiCall, colorContext } from '../utils.js';

const HealthResponseSchema = z.object({
  status: z.string(),
  keys: z
    .object({
      keyCount: z.number(),
      fetchedAt: z.string().nullable(),
      jwksUri: z.string().nullable(),
      fresh: z.boolean(),
    })
    .optional(),
});

export const healthCommand: Command = {
  name: 'health',
  description: 'Check health of a running instance',
  usage: 'keygate health [--url URL] [--json]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(`
Usage: ${this.usage}

Options:
      --url <url>    Server URL (default: http://127.0.0.1:3000)
      --json         Output raw JSON
  -h, --help         Show this help
\n`);
      return 0;
    }
    argv = helpResult.rest;

    const urlResult = extractFlag(argv, 'url');
    argv = urlResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');

    const baseUrl = urlResult.value ?? 'http://127.0.0.1:3000';

    try {
      const result = await apiCall(baseUrl, '/health');

      if (!result.ok) {
        ctx.stderr.write(`Health check failed (HTTP ${String(result.status)})\n`);
        return 1;
      }

      const parsed = HealthResponseSchema.safeParse(result.data);
      if (!parsed.success) {
        ctx.stderr.write(`Unexpected health response from ${baseUrl}\n`);
        return 1;
      }
      const data = parsed.data;

      if (jsonResult.value) {
        ctx.stdout.write(JSON.stringify(data, null, 2) + '\n');
        return data.status === 'ok' ? 0 : 1;
      }

      const c = colorContext(ctx.stdout);
      const statusLabel = data.status === 'ok' ? c.green('OK') : c.red('ERROR');
      ctx.stdout.write(`\n  Status:   ${statusLabel}\n`);
      ctx.stdout.write(`  Server:   ${baseUrl}\n`);

      if (data.keys) {
        const { keyCount, fetchedAt, jwksUri, fresh } = data.keys;
        const age =
          fetchedAt === null
            ? c.dim('not fetched yet')
            : `fetched ${formatDuration(Date.now() - Date.parse(fetchedAt))} ago, ${
                fresh ? c.green('fresh') : c.yellow('stale')
              }`;
        ctx.stdout.write(`  Keys:     ${String(keyCount)} (${age})\n`);
        if (jwksUri) ctx.stdout.write(`  JWKS:     ${jwksUri}\n`);
      }
      ctx.stdout.write('\n');

      return data.status === 'ok' ? 0 : 1;
    } catch (err) {
      ctx.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }
  },
};
