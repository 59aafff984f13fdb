import { reduceAdherence, reduceAdherenceByPerson, type AdherenceSummary, type PersonAdherence } from "./adherence";
import {
  caloriesProgress,
  goalProgress,
  rollingAverages7d,
  stepsProgress,
  weeklyStepTotals,
  type GoalProgress,
  type RollingAverages,
  type WeekGrouping,
  type WeeklyStepTotal,
} from "./metrics-aggregator";
import type { Goals, HealthMetric, HealthStore, Medication } from "./types/health";

export const RECENT_METRICS_LIMIT = 10;

export interface DashboardResponse {
  person: string;
  dateISO: string;
  goals: Goals;
  adherence: AdherenceSummary & { progress: number };
  activity7d: RollingAverages & { stepsProgress: number; caloriesProgress: number };
  goalProgress: GoalProgress;
  weeklySteps: WeeklyStepTotal[];
  recentMetrics: HealthMetric[];
  medications: Medication[];
  adherenceByPerson: PersonAdherence[];
}

export interface DashboardOptions {
  today: string;
  weekGrouping: WeekGrouping;
}

export async function buildDashboard(
  store: HealthStore,
  person: string,
  opts: DashboardOptions,
): Promise<DashboardResponse> {
  const [metrics, allMeds, goals] = await Promise.all([
    store.listMetrics(person),
    store.listMedications(),
    store.getGoals(),
  ]);
  const meds = allMeds.filter((m) => m.person === person);

  const adherence = reduceAdherence(meds);
  const avg = rollingAverages7d(metrics, opts.today);

  return {
    person,
    dateISO: opts.today,
    goals,
    adherence: {
      ...adherence,
      progress: adherence.total > 0 ? Math.min(1, adherence.pct / 100) : 0,
    },
    activity7d: {
      ...avg,
      stepsProgress: stepsProgress(avg.avgSteps, goals),
      caloriesProgress: caloriesProgress(avg.avgCalories, goals),
    },
    goalProgress: goalProgress(metrics, goals, opts.weekGrouping),
    weeklySteps: weeklyStepTotals(metrics, opts.weekGrouping),
    recentMetrics: metrics.slice(-RECENT_METRICS_LIMIT),
    medications: meds,
    adherenceByPerson: reduceAdherenceByPerson(allMeds),
  };
}
