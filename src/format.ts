/**
 * Output Formatter
 * Renders command results as human-readable text or as JSON.
 */

import { scaleNutrition, type Macros, type SearchFoodResult } from './api/index.js';
import type { CommandResult } from './commands.js';
import { WEEKDAY_NAMES } from './dates.js';

export interface RenderOptions {
  json: boolean;
}

const DASH = '—';

function fixed(value: number | undefined, digits = 0): string {
  return value === undefined ? DASH : value.toFixed(digits);
}

function macroLine(m: Partial<Macros>): string {
  return `${fixed(m.calories)} kcal | ${fixed(m.protein)}p / ${fixed(m.carbs)}c / ${fixed(m.fat)}f`;
}

function bodyFatSuffix(bodyFat: number | undefined): string {
  return bodyFat === undefined ? '' : ` (${bodyFat}% bf)`;
}

function ok(message: string, details: Record<string, unknown>): Record<string, unknown> {
  return { status: 'ok', message, ...details };
}

/**
 * Structured payload for JSON mode: the response itself for reads, a status object for writes
 */
export function toJson(result: CommandResult): unknown {
  switch (result.kind) {
    case 'login':
      return ok('Logged in successfully', { configPath: result.configPath });
    case 'profile':
      return result.profile;
    case 'goals':
      return result.goals;
    case 'nutrition':
    case 'food-log':
    case 'weight':
    case 'steps':
      return result.entries;
    case 'search-food':
      return result.results;
    case 'log-food':
      return ok('Food logged', {
        entryId: result.entryId,
        date: result.date,
        name: result.name,
        ...result.macros,
      });
    case 'log-searched-food':
      return ok('Searched food logged', {
        entryId: result.entryId,
        date: result.date,
        food: result.food.name,
        serving: result.serving.description,
        quantity: result.quantity,
        ...result.macros,
      });
    case 'log-weight':
      return ok('Weight logged', { date: result.date, weight: result.weight, bodyFat: result.bodyFat });
    case 'log-nutrition':
      return ok('Nutrition logged', { date: result.date, ...result.macros });
    case 'delete-food':
      return ok('Food entry deleted', { date: result.date, entryId: result.entryId });
    case 'delete-weight':
      return ok('Weight entry deleted', { date: result.date });
    case 'sync-day':
      return ok('Day synced', { date: result.date, ...result.totals });
  }
}

function renderSearchResult(food: SearchFoodResult, index: number): string[] {
  const brand = food.brand ? ` (${food.brand})` : '';
  const source = food.branded ? 'branded' : 'common';

  const serving = food.defaultServing;
  const macros = serving
    ? scaleNutrition(food, serving)
    : {
        calories: food.caloriesPer100g,
        protein: food.proteinPer100g,
        carbs: food.carbsPer100g,
        fat: food.fatPer100g,
      };
  const servingInfo = serving
    ? `per ${serving.description} (${serving.gramWeight.toFixed(0)}g)`
    : 'per 100g';

  const lines = [
    `  ${String(index + 1).padStart(2)}. ${food.name}${brand} [${source}]`,
    `      ${macroLine(macros)}  (${servingInfo})`,
  ];
  if (food.servings.length > 1) {
    const list = food.servings.map((s) => `${s.description} (${s.gramWeight.toFixed(0)}g)`);
    lines.push(`      servings: ${list.join(', ')}`);
  }
  lines.push('');
  return lines;
}

export function toText(result: CommandResult): string {
  switch (result.kind) {
    case 'login':
      return `✓ Logged in successfully. Config saved to ${result.configPath}`;

    case 'profile': {
      const lines = ['── Profile ──'];
      for (const [key, value] of Object.entries(result.profile)) {
        if (key === 'planner') continue;
        lines.push(`  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
      }
      return lines.join('\n');
    }

    case 'goals': {
      const { goals, weekday } = result;
      const lines = ['── Goals ──'];
      if (goals.tdee !== undefined) {
        lines.push(`  TDEE: ${goals.tdee.toFixed(0)} kcal`);
      }
      if (goals.programStyle !== undefined) {
        lines.push(`  Program: ${goals.programStyle} / ${goals.programType ?? DASH}`);
      }
      lines.push('', `  Today (${WEEKDAY_NAMES[weekday]}):`);
      const todays: [string, number | undefined, string][] = [
        ['Calories:', goals.calories[weekday], 'kcal'],
        ['Protein: ', goals.protein[weekday], 'g'],
        ['Carbs:   ', goals.carbs[weekday], 'g'],
        ['Fat:     ', goals.fat[weekday], 'g'],
      ];
      for (const [label, value, unit] of todays) {
        if (value !== undefined) lines.push(`    ${label} ${value.toFixed(0)} ${unit}`);
      }
      lines.push('', '  Weekly targets:');
      WEEKDAY_NAMES.forEach((day, i) => {
        const line = macroLine({
          calories: goals.calories[i],
          protein: goals.protein[i],
          carbs: goals.carbs[i],
          fat: goals.fat[i],
        });
        lines.push(`    ${day}: ${line}`);
      });
      return lines.join('\n');
    }

    case 'nutrition': {
      const { start, end, entries } = result;
      if (entries.length === 0) return `No nutrition data for ${start} to ${end}`;
      const lines = [`── Nutrition (${start} → ${end}) ──`];
      for (const n of entries) {
        lines.push(`  ${n.date}:  ${macroLine(n)} | sugar: ${fixed(n.sugar)} | fiber: ${fixed(n.fiber)}`);
      }
      return lines.join('\n');
    }

    case 'food-log': {
      const { date, entries } = result;
      if (entries.length === 0) return `No food entries for ${date}`;
      const lines = [`── Food Log (${date}) ──`];
      for (const f of entries) {
        const time = `${f.hour ?? '?'}:${String(f.minute ?? 0).padStart(2, '0')}`;
        const brand = f.brand ? ` (${f.brand})` : '';
        const macros = macroLine({
          calories: f.calories ?? 0,
          protein: f.protein ?? 0,
          carbs: f.carbs ?? 0,
          fat: f.fat ?? 0,
        });
        lines.push(
          `  [${time}] ${f.name ?? 'Unknown'}${brand} — ${macros} | ${fixed(f.weightGrams ?? 0)}g  [id: ${f.entryId}]`
        );
      }
      return lines.join('\n');
    }

    case 'weight': {
      const { start, end, entries } = result;
      if (entries.length === 0) return `No weight entries for ${start} to ${end}`;
      const lines = [`── Weight (${start} → ${end}) ──`];
      for (const w of entries) {
        lines.push(`  ${w.date}:  ${w.weight.toFixed(1)} kg${bodyFatSuffix(w.bodyFat)}`);
      }
      return lines.join('\n');
    }

    case 'steps': {
      const { start, end, entries } = result;
      if (entries.length === 0) return `No step data for ${start} to ${end}`;
      const lines = [`── Steps (${start} → ${end}) ──`];
      for (const s of entries) {
        lines.push(`  ${s.date}:  ${s.steps} steps`);
      }
      return lines.join('\n');
    }

    case 'search-food': {
      const { query, results } = result;
      if (results.length === 0) return `No results for '${query}'`;
      const lines = [`── Search Results for '${query}' (${results.length} results) ──`, ''];
      results.forEach((food, i) => lines.push(...renderSearchResult(food, i)));
      return lines.join('\n').trimEnd();
    }

    case 'log-food':
      return `✓ Logged '${result.name}' on ${result.date} — ${macroLine(result.macros)}`;

    case 'log-searched-food':
      return (
        `✓ Logged '${result.food.name}' on ${result.date} — ${macroLine(result.macros)} ` +
        `(${result.quantity.toFixed(1)}x ${result.serving.description})`
      );

    case 'log-weight':
      return `✓ Logged ${result.weight.toFixed(1)} kg${bodyFatSuffix(result.bodyFat)} on ${result.date}`;

    case 'log-nutrition':
      return `✓ Logged nutrition on ${result.date} — ${macroLine(result.macros)}`;

    case 'delete-food':
      return `✓ Deleted food entry ${result.entryId} on ${result.date}`;

    case 'delete-weight':
      return `✓ Deleted weight entry on ${result.date}`;

    case 'sync-day':
      return `✓ Synced daily totals for ${result.date} — ${macroLine(result.totals)}`;
  }
}

export function render(result: CommandResult, options: RenderOptions): string {
  return options.json ? JSON.stringify(toJson(result), null, 2) : toText(result);
}
