/**
 * macrofactor-cli
 * Global flag handling, help text and error reporting around the command handlers.
 */

import { COMMANDS, isCommandName, runCommand, type CommandService } from './commands.js';
import { loadConfig } from './config.js';
import { CliError } from './errors.js';
import { render } from './format.js';
import { ConfigStore, MacroFactorService, type LoadResult } from './services/index.js';

export interface CliDependencies {
  store: ConfigStore;
  createService: (store: ConfigStore, state: LoadResult) => CommandService;
  now: () => Date;
}

export interface GlobalFlags {
  json: boolean;
  help: boolean;
  args: string[];
}

/**
 * Pull --json and --help/-h out of argv. They count only in flag position:
 * never after a lone `--`, and never as the value of the preceding flag.
 */
export function extractGlobalFlags(argv: string[]): GlobalFlags {
  const flags: GlobalFlags = { json: false, help: false, args: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      flags.args.push(...argv.slice(i));
      break;
    }

    const previous = flags.args[flags.args.length - 1];
    const isValue =
      previous !== undefined && previous.startsWith('--') && !previous.includes('=') && !arg.startsWith('--');
    if (!isValue && arg === '--json') {
      flags.json = true;
    } else if (!isValue && (arg === '--help' || arg === '-h')) {
      flags.help = true;
    } else {
      flags.args.push(arg);
    }
  }

  return flags;
}

function defaultDependencies(): CliDependencies {
  return {
    store: new ConfigStore(),
    createService: (store, state) => new MacroFactorService(loadConfig(), store, state),
    now: () => new Date(),
  };
}

export function helpText(): string {
  const width = Math.max(...Object.keys(COMMANDS).map((name) => name.length));
  const commands = Object.entries(COMMANDS).map(
    ([name, definition]) => `  ${name.padEnd(width)}  ${definition.summary}`
  );

  return `
macrofactor-cli - CLI for MacroFactor nutrition tracking

Usage:
  macrofactor-cli [--json] <command> [options]

Commands:
${commands.join('\n')}

Global options:
  --json       Output as JSON
  -h, --help   Show help (use \`macrofactor-cli <command> --help\` for command options)

Environment (or a .env file in the working directory):
  MACROFACTOR_API_KEY      Firebase Web API key of the MacroFactor app (required)
  MACROFACTOR_PROJECT_ID   Firebase project of the MacroFactor app (required)
  MACROFACTOR_SEARCH_URL   Food search endpoint (optional)
  MACROFACTOR_CONFIG_DIR   Directory for the login and search cache (optional)
  MACROFACTOR_DEBUG=1      Log HTTP requests to stderr

Examples:
  macrofactor-cli login --email you@example.com --password '...'
  macrofactor-cli nutrition --start 2025-01-01 --end 2025-01-07
  macrofactor-cli search-food "egg"
  macrofactor-cli log-searched-food --food-index 1 --date 2025-01-15
  macrofactor-cli --json food-log --date 2025-01-15
`;
}

function reportError(message: string, json: boolean): void {
  if (json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    console.error(`Error: ${message}`);
  }
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function main(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const { json, help, args } = extractGlobalFlags(argv);
  const command = args[0];

  if (command === undefined || command === 'help') {
    const topic = args[1];
    if (topic !== undefined && isCommandName(topic)) {
      console.log(`Usage: ${COMMANDS[topic].usage}`);
    } else {
      console.log(helpText());
    }
    return 0;
  }

  if (!isCommandName(command)) {
    reportError(`Unknown command: ${command}. Run \`macrofactor-cli help\` for usage information.`, json);
    return 1;
  }

  if (help) {
    console.log(`Usage: ${COMMANDS[command].usage}`);
    return 0;
  }

  const deps = { ...defaultDependencies(), ...overrides };
  const state = deps.store.load();

  try {
    const result = await runCommand(command, args.slice(1), {
      state,
      store: deps.store,
      createService: () => deps.createService(deps.store, state),
      now: deps.now(),
    });
    console.log(render(result, { json }));
    return 0;
  } catch (error) {
    reportError(error instanceof Error ? error.message : String(error), json);
    return error instanceof CliError ? error.exitCode : 1;
  }
}
