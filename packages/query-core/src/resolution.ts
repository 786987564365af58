/**
 * @fileoverview Resolution code table and calendar arithmetic.
 *
 * Resolution codes are ISO 8601 durations as published by the API
 * (PT15M, PT60M, P1D, P1M, ...). The table lives in data/resolutions.json.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { MS_PER_DAY } from './split.js';

const MS_PER_MINUTE = 60 * 1000;

const resolutionTableSchema = z.record(
  z.object({
    label: z.string(),
    unit: z.enum(['minute', 'day', 'month']),
    amount: z.number().int().positive(),
  })
);

export type ResolutionUnit = 'minute' | 'day' | 'month';

/**
 * One entry of the resolution table.
 *
 * Minute and day steps are fixed lengths in UTC; month steps (monthly, yearly)
 * follow the calendar.
 */
export interface ResolutionStep {
  code: string;
  label: string;
  unit: ResolutionUnit;
  amount: number;
}

let cachedTable: Map<string, ResolutionStep> | undefined;

function loadResolutionTable(): Map<string, ResolutionStep> {
  if (cachedTable) {
    return cachedTable;
  }

  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const raw: unknown = JSON.parse(readFileSync(join(moduleDir, '..', 'data', 'resolutions.json'), 'utf-8'));
  const table = resolutionTableSchema.parse(raw);

  cachedTable = new Map(Object.entries(table).map(([code, entry]) => [code, { code, ...entry }]));
  return cachedTable;
}

/**
 * Looks up a resolution code. Returns undefined for codes outside the table.
 */
export function getResolution(code: string): ResolutionStep | undefined {
  return loadResolutionTable().get(code);
}

export function listResolutionCodes(): string[] {
  return [...loadResolutionTable().keys()];
}

/**
 * Adds whole months in UTC, clamping the day to the end of the target month
 * (Jan 31 + 1 month = Feb 28/29).
 */
function addMonths(instant: number, months: number): number {
  const date = new Date(instant);
  const totalMonths = date.getUTCFullYear() * 12 + date.getUTCMonth() + months;
  const year = Math.floor(totalMonths / 12);
  const month = totalMonths - year * 12;
  const lastDayOfMonth = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();

  return Date.UTC(
    year,
    month,
    Math.min(date.getUTCDate(), lastDayOfMonth),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
    date.getUTCMilliseconds()
  );
}

/**
 * Moves an instant forward by `count` resolution steps.
 *
 * @example
 * ```typescript
 * const quarterHour = getResolution('PT15M');
 * advanceByResolution(Date.UTC(2018, 8, 30, 22), quarterHour, 2); // 22:30Z
 * ```
 */
export function advanceByResolution(instant: number, step: ResolutionStep, count: number): number {
  switch (step.unit) {
    case 'minute':
      return instant + count * step.amount * MS_PER_MINUTE;
    case 'day':
      return instant + count * step.amount * MS_PER_DAY;
    case 'month':
      return addMonths(instant, count * step.amount);
  }
}
