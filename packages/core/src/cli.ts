#!/usr/bin/env -S node --import tsx
/**
 * KeyGate CLI: Modular command router entry point.
 *
 * Usage:
 *   keygate                          # Start with defaults
 *   keygate start --port 3001        # Custom port
 *   keygate health                   # Health check
 *   keygate config                   # Show config
 *   keygate config validate          # Pre-startup check
 *   keygate whoami --token <jwt>     # Resolve a token against a running gateway
 */

import { createCliRouter } from './cli/registry.js';

const router = createCliRouter();
const { command, rest } = router.resolve(process.argv);

command
  .run({ argv: rest, stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    if (code !== 0) process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
