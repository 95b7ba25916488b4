/**
 * CLI Command Handlers
 * Each handler validates its flags, makes one service call and returns a tagged result
 * for the formatter. Validation always happens before any network call.
 */

import {
  defaultServing,
  type FoodEntry,
  type FoodServing,
  type Goals,
  type Macros,
  type NutritionSummary,
  type Profile,
  type SearchFoodResult,
  type StepEntry,
  type WeightEntry,
} from './api/index.js';
import { makeLoggedAt, parseDate, parseTime, resolveRange, today, weekdayIndex } from './dates.js';
import { IndexOutOfRangeError, NotLoggedInError, ValidationError } from './errors.js';
import type { ConfigStore, LoadResult } from './services/config-store.service.js';
import type { MacroFactorService } from './services/macrofactor.service.js';

// ─── Results ───

export type CommandResult =
  | { kind: 'login'; configPath: string }
  | { kind: 'profile'; profile: Profile }
  | { kind: 'goals'; goals: Goals; weekday: number }
  | { kind: 'nutrition'; start: string; end: string; entries: NutritionSummary[] }
  | { kind: 'food-log'; date: string; entries: FoodEntry[] }
  | { kind: 'weight'; start: string; end: string; entries: WeightEntry[] }
  | { kind: 'steps'; start: string; end: string; entries: StepEntry[] }
  | { kind: 'search-food'; query: string; results: SearchFoodResult[] }
  | { kind: 'log-food'; date: string; name: string; entryId: string; macros: Macros }
  | {
      kind: 'log-searched-food';
      date: string;
      food: SearchFoodResult;
      serving: FoodServing;
      quantity: number;
      entryId: string;
      macros: Macros;
    }
  | { kind: 'log-weight'; date: string; weight: number; bodyFat?: number }
  | { kind: 'log-nutrition'; date: string; macros: Macros }
  | { kind: 'delete-food'; date: string; entryId: string }
  | { kind: 'delete-weight'; date: string }
  | { kind: 'sync-day'; date: string; totals: Macros };

export type CommandService = Pick<
  MacroFactorService,
  | 'login'
  | 'getProfile'
  | 'getGoals'
  | 'getNutrition'
  | 'getFoodLog'
  | 'getWeightEntries'
  | 'getSteps'
  | 'searchFoods'
  | 'logFood'
  | 'logSearchedFood'
  | 'logWeight'
  | 'logNutrition'
  | 'deleteFoodEntry'
  | 'deleteWeightEntry'
  | 'syncDay'
>;

/**
 * Everything a handler may touch, loaded once at startup
 */
export interface CommandContext {
  state: LoadResult;
  store: ConfigStore;
  createService: () => CommandService;
  now: Date;
}

// ─── Arg parsing helpers ───

export interface ParsedArgs {
  flags: Map<string, string>;
  positionals: string[];
}

export function parseArgs(args: string[], allowed: readonly string[], usage: string): ParsedArgs {
  const flags = new Map<string, string>();
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eqIdx = arg.indexOf('=');
    const flag = eqIdx === -1 ? arg : arg.slice(0, eqIdx);
    if (!allowed.includes(flag)) {
      throw new ValidationError(`Unknown flag: ${flag}\nUsage: ${usage}`);
    }

    let value: string | undefined;
    if (eqIdx !== -1) {
      value = arg.slice(eqIdx + 1);
    } else {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }
    if (value === undefined || value === '') {
      throw new ValidationError(`Missing value for ${flag}\nUsage: ${usage}`);
    }
    flags.set(flag, value);
  }

  return { flags, positionals };
}

function requireFlag(args: ParsedArgs, flag: string, usage: string): string {
  const value = args.flags.get(flag);
  if (value === undefined) {
    throw new ValidationError(`Missing required flag ${flag}\nUsage: ${usage}`);
  }
  return value;
}

export function parseNumber(value: string, flag: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new ValidationError(`Invalid value for ${flag}: ${value}`);
  }
  if (n < 0) {
    throw new ValidationError(`${flag} must not be negative: ${value}`);
  }
  return n;
}

export function parsePositiveInt(value: string, flag: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ValidationError(`${flag} must be a positive integer: ${value}`);
  }
  return Number(value);
}

function optionalNumber(args: ParsedArgs, flag: string): number | undefined {
  const value = args.flags.get(flag);
  return value === undefined ? undefined : parseNumber(value, flag);
}

function requireMacros(args: ParsedArgs, usage: string): Macros {
  return {
    calories: parseNumber(requireFlag(args, '--calories', usage), '--calories'),
    protein: parseNumber(requireFlag(args, '--protein', usage), '--protein'),
    carbs: parseNumber(requireFlag(args, '--carbs', usage), '--carbs'),
    fat: parseNumber(requireFlag(args, '--fat', usage), '--fat'),
  };
}

function requireDate(args: ParsedArgs, usage: string): string {
  return parseDate(requireFlag(args, '--date', usage));
}

/**
 * Service for commands that need stored credentials; fails before any network call when logged out
 */
function authenticatedService(ctx: CommandContext): CommandService {
  if (ctx.state.status !== 'configured') {
    throw new NotLoggedInError();
  }
  return ctx.createService();
}

/**
 * Resolve a 1-based serving index: 1 is the default serving, k > 1 is servings[k - 1]
 */
export function selectServing(food: SearchFoodResult, index: number): FoodServing {
  if (index === 1) {
    return defaultServing(food);
  }
  const serving = food.servings[index - 1];
  if (!serving) {
    throw new IndexOutOfRangeError(
      `Invalid serving index ${index}. Food has ${food.servings.length} servings.`
    );
  }
  return serving;
}

// ─── Command table ───

interface CommandDefinition {
  summary: string;
  usage: string;
  flags: readonly string[];
  run(args: ParsedArgs, ctx: CommandContext): Promise<CommandResult>;
}

const RANGE_FLAGS = ['--start', '--end'] as const;
const MACRO_FLAGS = ['--calories', '--protein', '--carbs', '--fat'] as const;

export const COMMANDS = {
  login: {
    summary: 'Authenticate and save refresh token',
    usage: 'macrofactor-cli login --email <email> --password <password>',
    flags: ['--email', '--password'],
    async run(args, ctx) {
      const email = requireFlag(args, '--email', this.usage);
      const password = requireFlag(args, '--password', this.usage);
      await ctx.createService().login(email, password);
      return { kind: 'login', configPath: ctx.store.path };
    },
  },

  profile: {
    summary: 'Show user profile',
    usage: 'macrofactor-cli profile',
    flags: [],
    async run(_args, ctx) {
      const profile = await authenticatedService(ctx).getProfile();
      return { kind: 'profile', profile };
    },
  },

  goals: {
    summary: 'Show current calorie/macro targets and TDEE',
    usage: 'macrofactor-cli goals',
    flags: [],
    async run(_args, ctx) {
      const goals = await authenticatedService(ctx).getGoals();
      return { kind: 'goals', goals, weekday: weekdayIndex(ctx.now) };
    },
  },

  nutrition: {
    summary: 'Daily nutrition summaries (default: last 7 days)',
    usage: 'macrofactor-cli nutrition [--start YYYY-MM-DD] [--end YYYY-MM-DD]',
    flags: RANGE_FLAGS,
    async run(args, ctx) {
      const { start, end } = resolveRange(args.flags.get('--start'), args.flags.get('--end'), ctx.now);
      const entries = await authenticatedService(ctx).getNutrition(start, end);
      return { kind: 'nutrition', start, end, entries };
    },
  },

  'food-log': {
    summary: 'Food entries for a day (default: today)',
    usage: 'macrofactor-cli food-log [--date YYYY-MM-DD]',
    flags: ['--date'],
    async run(args, ctx) {
      const value = args.flags.get('--date');
      const date = value === undefined ? today(ctx.now) : parseDate(value);
      const entries = await authenticatedService(ctx).getFoodLog(date);
      return { kind: 'food-log', date, entries };
    },
  },

  weight: {
    summary: 'Weight entries (default: last 7 days)',
    usage: 'macrofactor-cli weight [--start YYYY-MM-DD] [--end YYYY-MM-DD]',
    flags: RANGE_FLAGS,
    async run(args, ctx) {
      const { start, end } = resolveRange(args.flags.get('--start'), args.flags.get('--end'), ctx.now);
      const entries = await authenticatedService(ctx).getWeightEntries(start, end);
      return { kind: 'weight', start, end, entries };
    },
  },

  steps: {
    summary: 'Step counts (default: last 7 days)',
    usage: 'macrofactor-cli steps [--start YYYY-MM-DD] [--end YYYY-MM-DD]',
    flags: RANGE_FLAGS,
    async run(args, ctx) {
      const { start, end } = resolveRange(args.flags.get('--start'), args.flags.get('--end'), ctx.now);
      const entries = await authenticatedService(ctx).getSteps(start, end);
      return { kind: 'steps', start, end, entries };
    },
  },

  'search-food': {
    summary: 'Search the food database and cache the results',
    usage: 'macrofactor-cli search-food "<query>"',
    flags: [],
    async run(args, ctx) {
      const query = args.positionals.join(' ').trim();
      if (!query) {
        throw new ValidationError(`Missing search query\nUsage: ${this.usage}`);
      }
      const results = await authenticatedService(ctx).searchFoods(query);
      // An empty result set keeps the previous cache
      if (results.length > 0) {
        ctx.store.saveSearchCache({ query, savedAt: ctx.now.toISOString(), results });
      }
      return { kind: 'search-food', query, results };
    },
  },

  'log-food': {
    summary: 'Log a food entry (quick add)',
    usage:
      'macrofactor-cli log-food --date YYYY-MM-DD --name <name> --calories N --protein N --carbs N --fat N [--time HH:MM]',
    flags: ['--date', '--name', ...MACRO_FLAGS, '--time'],
    async run(args, ctx) {
      const date = requireDate(args, this.usage);
      const name = requireFlag(args, '--name', this.usage);
      const macros = requireMacros(args, this.usage);
      const loggedAt = makeLoggedAt(date, args.flags.get('--time'), ctx.now);

      const { entryId } = await authenticatedService(ctx).logFood({ date, name, loggedAt, ...macros });
      return { kind: 'log-food', date, name, entryId, macros };
    },
  },

  'log-searched-food': {
    summary: 'Log a food from the last search results',
    usage:
      'macrofactor-cli log-searched-food --date YYYY-MM-DD --food-index N [--serving N] [--quantity N] [--time HH:MM]',
    flags: ['--date', '--food-index', '--serving', '--quantity', '--time'],
    async run(args, ctx) {
      const date = requireDate(args, this.usage);
      const foodIndex = parsePositiveInt(requireFlag(args, '--food-index', this.usage), '--food-index');
      const servingValue = args.flags.get('--serving');
      const servingIndex = servingValue === undefined ? 1 : parsePositiveInt(servingValue, '--serving');
      const quantity = optionalNumber(args, '--quantity') ?? 1;
      const time = args.flags.get('--time');
      if (time !== undefined) parseTime(time);

      const results = ctx.state.status === 'configured' ? (ctx.state.config.lastSearch?.results ?? []) : [];
      const food = results[foodIndex - 1];
      if (!food) {
        throw new IndexOutOfRangeError(
          `Invalid food index ${foodIndex}. Last search had ${results.length} results.`
        );
      }
      const serving = selectServing(food, servingIndex);
      const loggedAt = makeLoggedAt(date, time, ctx.now);

      const { entryId, macros } = await authenticatedService(ctx).logSearchedFood({
        date,
        food,
        serving,
        quantity,
        loggedAt,
      });
      return { kind: 'log-searched-food', date, food, serving, quantity, entryId, macros };
    },
  },

  'log-weight': {
    summary: 'Log a weight entry',
    usage: 'macrofactor-cli log-weight --date YYYY-MM-DD --weight KG [--body-fat PCT]',
    flags: ['--date', '--weight', '--body-fat'],
    async run(args, ctx) {
      const date = requireDate(args, this.usage);
      const weight = parseNumber(requireFlag(args, '--weight', this.usage), '--weight');
      const bodyFat = optionalNumber(args, '--body-fat');

      await authenticatedService(ctx).logWeight(date, weight, bodyFat);
      return { kind: 'log-weight', date, weight, ...(bodyFat !== undefined && { bodyFat }) };
    },
  },

  'log-nutrition': {
    summary: 'Log a nutrition summary (manual import)',
    usage: 'macrofactor-cli log-nutrition --date YYYY-MM-DD --calories N --protein N --carbs N --fat N',
    flags: ['--date', ...MACRO_FLAGS],
    async run(args, ctx) {
      const date = requireDate(args, this.usage);
      const macros = requireMacros(args, this.usage);

      await authenticatedService(ctx).logNutrition(date, macros);
      return { kind: 'log-nutrition', date, macros };
    },
  },

  'delete-food': {
    summary: 'Delete a food entry',
    usage: 'macrofactor-cli delete-food --date YYYY-MM-DD --entry-id <id>',
    flags: ['--date', '--entry-id'],
    async run(args, ctx) {
      const date = requireDate(args, this.usage);
      const entryId = requireFlag(args, '--entry-id', this.usage);

      await authenticatedService(ctx).deleteFoodEntry(date, entryId);
      return { kind: 'delete-food', date, entryId };
    },
  },

  'delete-weight': {
    summary: 'Delete a weight entry',
    usage: 'macrofactor-cli delete-weight --date YYYY-MM-DD',
    flags: ['--date'],
    async run(args, ctx) {
      const date = requireDate(args, this.usage);

      await authenticatedService(ctx).deleteWeightEntry(date);
      return { kind: 'delete-weight', date };
    },
  },

  'sync-day': {
    summary: 'Sync daily nutrition totals from the food log',
    usage: 'macrofactor-cli sync-day --date YYYY-MM-DD',
    flags: ['--date'],
    async run(args, ctx) {
      const date = requireDate(args, this.usage);

      const totals = await authenticatedService(ctx).syncDay(date);
      return { kind: 'sync-day', date, totals };
    },
  },
} satisfies Record<string, CommandDefinition>;

export type CommandName = keyof typeof COMMANDS;

export function isCommandName(name: string): name is CommandName {
  return Object.hasOwn(COMMANDS, name);
}

// ─── Router ───

export async function runCommand(
  command: CommandName,
  args: string[],
  ctx: CommandContext
): Promise<CommandResult> {
  const definition: CommandDefinition = COMMANDS[command];
  const parsed = parseArgs(args, definition.flags, definition.usage);
  if (parsed.positionals.length > 0 && command !== 'search-food') {
    throw new ValidationError(
      `Unexpected argument: ${parsed.positionals[0]}\nUsage: ${definition.usage}`
    );
  }
  return definition.run(parsed, ctx);
}
