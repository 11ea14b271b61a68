import { createRouter, type Router } from './router.js';
import { startCommand } from './commands/start.js';
import { healthCommand } from './commands/health.js';
import { configCommand } from './commands/config.js';
import { whoamiCommand } from './commands/whoami.js';

/** The keygate command set, with `start` as the default. */
export function createCliRouter(): Router {
  const router = createRouter('start');

  router.register(startCommand);
  router.register(healthCommand);
  router.register(configCommand);
  router.register(whoamiCommand);

  router.register({
    name: 'help',
    description: 'Show available commands',
    usage: 'keygate help',
    async run(ctx) {
      router.printHelp(ctx.stdout);
      return 0;
    },
  });

  return router;
}
