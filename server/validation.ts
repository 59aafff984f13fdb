import { isValidDateString } from "../lib/dates";
import { MAX_STORED_INT, type Goals, type NewHealthMetric, type NewMedication } from "./types/health";

const TIME_REGEX = /^([01]\d|2[0-3]):[0-5]\d$/;

export type Validated<T> = { ok: true; value: T } | { ok: false; errors: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function isValidTime(time: string): boolean {
  return typeof time === "string" && TIME_REGEX.test(time);
}

export function isNonNegativeInt(val: unknown): val is number {
  return typeof val === "number" && Number.isInteger(val) && val >= 0 && val <= MAX_STORED_INT;
}

function readCount(value: unknown): unknown {
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return value;
}

export function validatePersonName(body: unknown): Validated<string> {
  const name = optionalText(isRecord(body) ? body.name : undefined);
  if (!name) return { ok: false, errors: ["name is required"] };
  return { ok: true, value: name };
}

export function validateMedicationInput(
  body: unknown,
  activePerson: string,
  today: string,
): Validated<NewMedication> {
  const b = isRecord(body) ? body : {};
  const errors: string[] = [];

  const name = optionalText(b.name);
  const time = optionalText(b.time);
  const date = optionalText(b.date) || today;

  if (!name || !time) {
    errors.push("Please fill in at least medicine name and time.");
  }
  if (time && !isValidTime(time)) {
    errors.push(`time: expected HH:MM, got "${time}"`);
  }
  if (!isValidDateString(date)) {
    errors.push(`date: invalid date string "${date}"`);
  }
  if (b.caregiverContact != null && typeof b.caregiverContact !== "string") {
    errors.push("caregiverContact: must be a string");
  }
  if (errors.length > 0) return { ok: false, errors };

  return {
    ok: true,
    value: {
      person: optionalText(b.person) || activePerson,
      name,
      date,
      time,
      caregiverContact: optionalText(b.caregiverContact) || null,
    },
  };
}

export function validateMetricInput(
  body: unknown,
  activePerson: string,
  today: string,
): Validated<NewHealthMetric> {
  const b = isRecord(body) ? body : {};
  const errors: string[] = [];

  const date = optionalText(b.date) || today;
  const steps = readCount(b.steps ?? 0);
  const calories = readCount(b.calories ?? 0);

  if (!isValidDateString(date)) {
    errors.push(`date: invalid date string "${date}"`);
  }
  if (!isNonNegativeInt(steps)) {
    errors.push(`steps: must be an integer from 0 to ${MAX_STORED_INT}, got ${JSON.stringify(b.steps)}`);
  }
  if (!isNonNegativeInt(calories)) {
    errors.push(`calories: must be an integer from 0 to ${MAX_STORED_INT}, got ${JSON.stringify(b.calories)}`);
  }
  if (errors.length > 0 || !isNonNegativeInt(steps) || !isNonNegativeInt(calories)) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    value: { person: optionalText(b.person) || activePerson, date, steps, calories },
  };
}

export function validateGoalsInput(body: unknown): Validated<Goals> {
  const b = isRecord(body) ? body : {};
  const weekly = readCount(b.weeklyStepsTarget);
  const daily = readCount(b.dailyCaloriesTarget);
  const errors: string[] = [];

  if (!isNonNegativeInt(weekly)) {
    errors.push(`weeklyStepsTarget: must be an integer from 0 to ${MAX_STORED_INT}, got ${JSON.stringify(b.weeklyStepsTarget)}`);
  }
  if (!isNonNegativeInt(daily)) {
    errors.push(`dailyCaloriesTarget: must be an integer from 0 to ${MAX_STORED_INT}, got ${JSON.stringify(b.dailyCaloriesTarget)}`);
  }
  if (!isNonNegativeInt(weekly) || !isNonNegativeInt(daily)) return { ok: false, errors };

  return { ok: true, value: { weeklyStepsTarget: weekly, dailyCaloriesTarget: daily } };
}
