/**
 * CLI Router: maps the first positional argument to a registered command.
 */

export interface CommandContext {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface Command {
  name: string;
  aliases?: string[];
  description: string;
  usage: string;
  run(ctx: CommandContext): Promise<number>;
}

export interface ResolvedCommand {
  command: Command;
  rest: string[];
}

export interface Router {
  register(command: Command): void;
  /** Resolve from a full process.argv (node binary and script path first). */
  resolve(argv: string[]): ResolvedCommand;
  getCommands(): Command[];
  printHelp(stream: NodeJS.WritableStream): void;
}

export function createRouter(defaultCommand = 'start'): Router {
  const commands: Command[] = [];
  const byName = new Map<string, Command>();

  function lookupDefault(): Command {
    const command = byName.get(defaultCommand);
    if (!command) {
      throw new Error(`Default command "${defaultCommand}" not registered`);
    }
    return command;
  }

  return {
    register(command) {
      commands.push(command);
      byName.set(command.name, command);
      for (const alias of command.aliases ?? []) {
        byName.set(alias, command);
      }
    },

    resolve(argv) {
      const args = argv.slice(2);
      const first = args[0];

      if (first === undefined || first.startsWith('-')) {
        return { command: lookupDefault(), rest: args };
      }

      const command = byName.get(first);
      if (command) {
        return { command, rest: args.slice(1) };
      }
      return { command: lookupDefault(), rest: args };
    },

    getCommands() {
      return [...commands];
    },

    printHelp(stream) {
      const width = Math.max(0, ...commands.map((c) => c.name.length));
      stream.write('\nUsage: keygate <command> [options]\n\nCommands:\n');
      for (const command of commands) {
        const aliases = command.aliases?.length ? ` (${command.aliases.join(', ')})` : '';
        stream.write(`  ${command.name.padEnd(width)}  ${command.description}${aliases}\n`);
      }
      stream.write('\nRun "keygate <command> --help" for command options.\n\n');
    },
  };
}
