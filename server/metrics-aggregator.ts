import { addDays, isoWeek } from "../lib/dates";
import type { Goals, HealthMetric } from "./types/health";

export type WeekGrouping = "iso_week" | "iso_year_week";

export interface RollingAverages {
  windowStart: string;
  windowEnd: string;
  recordsInWindow: number;
  avgSteps: number;
  avgCalories: number;
}

export interface WeeklyStepTotal {
  week: string;
  steps: number;
}

export interface GoalProgress {
  week: string | null;
  weeklySteps: number;
  weeklyTarget: number;
  ratio: number;
}

const clamp = (x: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, x));

export const ROLLING_WINDOW_DAYS = 7;

/**
 * Mean steps/calories over the trailing 7 calendar days including `today`.
 * Means are truncated to whole numbers; an empty window averages to 0.
 */
export function rollingAverages7d(metrics: HealthMetric[], today: string): RollingAverages {
  const windowStart = addDays(today, -(ROLLING_WINDOW_DAYS - 1));
  const inWindow = metrics.filter((m) => m.date >= windowStart);
  if (inWindow.length === 0) {
    return { windowStart, windowEnd: today, recordsInWindow: 0, avgSteps: 0, avgCalories: 0 };
  }
  const steps = inWindow.reduce((s, m) => s + m.steps, 0);
  const calories = inWindow.reduce((s, m) => s + m.calories, 0);
  return {
    windowStart,
    windowEnd: today,
    recordsInWindow: inWindow.length,
    avgSteps: Math.trunc(steps / inWindow.length),
    avgCalories: Math.trunc(calories / inWindow.length),
  };
}

export function weekKey(date: string, grouping: WeekGrouping): string {
  const { year, week } = isoWeek(date);
  if (grouping === "iso_year_week") return `${year}-W${String(week).padStart(2, "0")}`;
  return String(week);
}

function compareWeekKeys(a: string, b: string, grouping: WeekGrouping): number {
  if (grouping === "iso_week") return Number(a) - Number(b);
  return a.localeCompare(b);
}

export function weeklyStepTotals(
  metrics: HealthMetric[],
  grouping: WeekGrouping = "iso_week",
): WeeklyStepTotal[] {
  const byWeek = new Map<string, number>();
  for (const m of metrics) {
    const key = weekKey(m.date, grouping);
    byWeek.set(key, (byWeek.get(key) ?? 0) + m.steps);
  }
  return [...byWeek.entries()]
    .map(([week, steps]) => ({ week, steps }))
    .sort((a, b) => compareWeekKeys(a.week, b.week, grouping));
}

// Under "iso_week" the highest week number wins even when it belongs to the
// previous year (late December next to early January data).
export function currentWeekSteps(
  metrics: HealthMetric[],
  grouping: WeekGrouping = "iso_week",
): { week: string | null; steps: number } {
  const totals = weeklyStepTotals(metrics, grouping);
  if (totals.length === 0) return { week: null, steps: 0 };
  const last = totals[totals.length - 1];
  return { week: last.week, steps: last.steps };
}

export function progressRatio(value: number, target: number): number {
  if (!(target > 0)) return 0;
  return clamp(value / target, 0, 1);
}

export function goalProgress(
  metrics: HealthMetric[],
  goals: Goals,
  grouping: WeekGrouping = "iso_week",
): GoalProgress {
  const { week, steps } = currentWeekSteps(metrics, grouping);
  return {
    week,
    weeklySteps: steps,
    weeklyTarget: goals.weeklyStepsTarget,
    ratio: progressRatio(steps, goals.weeklyStepsTarget),
  };
}

export function stepsProgress(avgSteps: number, goals: Goals): number {
  return progressRatio(avgSteps * 7, goals.weeklyStepsTarget);
}

export function caloriesProgress(avgCalories: number, goals: Goals): number {
  return progressRatio(avgCalories, goals.dailyCaloriesTarget);
}
