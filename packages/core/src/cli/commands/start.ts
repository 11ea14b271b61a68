/**
 * Start Command: Starts the KeyGate gateway.
 */

import { LoggingConfigSchema, type PartialConfig } from '@keygate/shared';
import { createKeyGate, type KeyGate } from '../../keygate.js';
import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag } from '../utils.js';
import { VERSION } from '../../version.js';

function printBanner(stream: NodeJS.WritableStream, address: string, apiPrefix: string): void {
  const versionLabel = `v${VERSION}`.padEnd(13);
  stream.write(`
  ╔═══════════════════════════════════════════╗
  ║          KeyGate ${versionLabel}               ║
  ║   OIDC Bearer-Token Gateway               ║
  ╚═══════════════════════════════════════════╝

  Gateway:    ${address}
  Health:     ${address}/health
  API:        ${address}${apiPrefix}/
\n`);
}

function printHelp(stream: NodeJS.WritableStream): void {
  stream.write(`
Usage: keygate [start] [options]

Start the KeyGate gateway server.

Options:
  -p, --port <number>      Gateway port (default: 3000)
  -H, --host <string>      Gateway host (default: 127.0.0.1)
  -c, --config <path>      Config file path (YAML)
  -l, --log-level <level>  Log level: trace|debug|info|warn|error|fatal
      --warm-keys          Fetch signing keys before accepting requests
  -v, --version            Show version
  -h, --help               Show this help

Environment Variables:
  OIDC_ISSUER_URL          Token issuer, e.g. https://idp.example.com/realms/main (required)
  OIDC_AUDIENCE            Expected token audience (required)
  OIDC_CLIENT_ID           Client whose resource_access roles are honored
  OIDC_CACHE_TTL_SECONDS   Signing key cache lifetime (default: 300)
  BACKEND_CORS_ORIGINS     Allowed browser origins (JSON array or comma list)
\n`);
}

export const startCommand: Command = {
  name: 'start',
  description: 'Start the gateway server (default)',
  usage: 'keygate [start] [options]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    // --help
    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      printHelp(ctx.stdout);
      return 0;
    }
    argv = helpResult.rest;

    // --version
    const versionResult = extractBoolFlag(argv, 'version', 'v');
    if (versionResult.value) {
      ctx.stdout.write(`keygate v${VERSION}\n`);
      return 0;
    }
    argv = versionResult.rest;

    // Parse flags
    const portResult = extractFlag(argv, 'port', 'p');
    argv = portResult.rest;
    const hostResult = extractFlag(argv, 'host', 'H');
    argv = hostResult.rest;
    const configResult = extractFlag(argv, 'config', 'c');
    argv = configResult.rest;
    const logLevelResult = extractFlag(argv, 'log-level', 'l');
    argv = logLevelResult.rest;
    const warmKeysResult = extractBoolFlag(argv, 'warm-keys');

    // Build config overrides
    const overrides: PartialConfig = {};
    if (portResult.value !== undefined || hostResult.value !== undefined) {
      overrides.gateway = {
        ...(portResult.value !== undefined ? { port: Number(portResult.value) } : {}),
        ...(hostResult.value !== undefined ? { host: hostResult.value } : {}),
      };
    }
    if (logLevelResult.value !== undefined) {
      const level = LoggingConfigSchema.shape.level.safeParse(logLevelResult.value.toLowerCase());
      if (!level.success) {
        ctx.stderr.write(`Error: invalid log level "${logLevelResult.value}"\n`);
        return 1;
      }
      overrides.logging = { level: level.data };
    }

    let instance: KeyGate | null = null;

    try {
      instance = createKeyGate({
        config: {
          configPath: configResult.value,
          overrides: Object.keys(overrides).length > 0 ? overrides : undefined,
        },
        warmKeys: warmKeysResult.value,
      });
      const address = await instance.start();
      printBanner(ctx.stdout, address, instance.getConfig().core.apiPrefix);
    } catch (error) {
      await instance?.shutdown();
      ctx.stderr.write(
        `Failed to start KeyGate: ${error instanceof Error ? error.message : String(error)}\n`
      );
      return 1;
    }

    const running = instance;

    // Block until shutdown signal
    return new Promise<number>((resolve) => {
      const shutdown = async (signal: string): Promise<void> => {
        ctx.stdout.write(`\nReceived ${signal}, shutting down...\n`);
        try {
          await running.shutdown();
          ctx.stdout.write('Shutdown complete.\n');
          resolve(0);
        } catch (err) {
          ctx.stderr.write(`Error during shutdown: ${String(err)}\n`);
          resolve(1);
        }
      };

      process.once('SIGINT', () => void shutdown('SIGINT'));
      process.once('SIGTERM', () => void shutdown('SIGTERM'));
    });
  },
};
