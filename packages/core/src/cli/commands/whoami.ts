/**
 * Whoami Command: Show the principal a running gateway builds from a token.
 */

import { z } from 'zod';
import { ErrorResponseSchema } from '@keygate/shared';
import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag, apiCall, colorContext } from '../utils.js';

const WhoamiResponseSchema = z.object({
  subject: z.string(),
  username: z.string().nullable(),
  email: z.string().nullable(),
  roles: z.array(z.string()),
  issuer: z.string(),
});

export const whoamiCommand: Command = {
  name: 'whoami',
  description: 'Show the identity and roles a token resolves to',
  usage: 'keygate whoami [--token TOKEN] [--url URL] [--prefix PATH] [--json]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(`
Usage: ${this.usage}

Options:
      --token <token>  Bearer token (default: $KEYGATE_TOKEN)
      --url <url>      Server URL (default: http://127.0.0.1:3000)
      --prefix <path>  API prefix (default: /api)
      --json           Output raw JSON
  -h, --help           Show this help
\n`);
      return 0;
    }
    argv = helpResult.rest;

    const tokenResult = extractFlag(argv, 'token');
    argv = tokenResult.rest;
    const urlResult = extractFlag(argv, 'url');
    argv = urlResult.rest;
    const prefixResult = extractFlag(argv, 'prefix');
    argv = prefixResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');

    const token = tokenResult.value ?? process.env.KEYGATE_TOKEN;
    if (!token) {
      ctx.stderr.write('Error: no token given (use --token or set KEYGATE_TOKEN)\n');
      return 1;
    }

    const baseUrl = urlResult.value ?? 'http://127.0.0.1:3000';
    const prefix = prefixResult.value ?? '/api';

    try {
      const result = await apiCall(baseUrl, `${prefix}/protected`, { token });

      if (!result.ok) {
        const error = ErrorResponseSchema.safeParse(result.data);
        const detail = error.success
          ? `${error.data.kind ?? error.data.error}: ${error.data.message}`
          : `HTTP ${String(result.status)}`;
        const requestId = result.requestId ? ` [request ${result.requestId}]` : '';
        ctx.stderr.write(`Rejected (${String(result.status)}) ${detail}${requestId}\n`);
        return 1;
      }

      const parsed = WhoamiResponseSchema.safeParse(result.data);
      if (!parsed.success) {
        ctx.stderr.write(`Unexpected response from ${baseUrl}${prefix}/protected\n`);
        return 1;
      }
      const me = parsed.data;

      if (jsonResult.value) {
        ctx.stdout.write(JSON.stringify(me, null, 2) + '\n');
        return 0;
      }

      const c = colorContext(ctx.stdout);
      ctx.stdout.write(`\n  Subject:   ${c.bold(me.subject)}\n`);
      ctx.stdout.write(`  Username:  ${me.username ?? c.dim('-')}\n`);
      ctx.stdout.write(`  Email:     ${me.email ?? c.dim('-')}\n`);
      ctx.stdout.write(`  Issuer:    ${me.issuer}\n`);
      ctx.stdout.write(
        `  Roles:     ${me.roles.length > 0 ? me.roles.join(', ') : c.dim('(none)')}\n\n`
      );
      return 0;
    } catch (err) {
      ctx.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }
  },
};
