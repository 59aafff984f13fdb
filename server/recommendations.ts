import { formatOneDecimal } from "../lib/format";
import { reduceAdherence, type AdherenceSummary } from "./adherence";
import { rollingAverages7d } from "./metrics-aggregator";
import type { Goals, HealthMetric, HealthStore, Medication } from "./types/health";

export interface RecommendationPolicy {
  /** Fraction of the daily step share (weekly target / 7) below which steps are flagged. */
  stepsShortfallFactor: number;
  /** Multiple of the daily calorie target above which intake is flagged. */
  caloriesExcessFactor: number;
  /** Adherence percentage below which reminders are suggested. */
  adherenceThresholdPct: number;
}

export const DEFAULT_RECOMMENDATION_POLICY: RecommendationPolicy = {
  stepsShortfallFactor: 0.8,
  caloriesExcessFactor: 1.1,
  adherenceThresholdPct: 80,
};

export interface ActivitySnapshot {
  metricCount: number;
  avgSteps: number;
  avgCalories: number;
}

export interface RecommendationInput {
  person: string;
  activity: ActivitySnapshot;
  adherence: AdherenceSummary;
  goals: Goals;
}

export const NOT_ENOUGH_DATA_MESSAGE =
  "Not enough data yet. Please add health metrics and medications.";

export function generateRecommendations(
  input: RecommendationInput,
  policy: RecommendationPolicy = DEFAULT_RECOMMENDATION_POLICY,
): string[] {
  const { person, activity, adherence, goals } = input;
  const recs: string[] = [];

  if (activity.metricCount > 0) {
    const dailyStepShare = goals.weeklyStepsTarget / 7;
    if (activity.avgSteps < dailyStepShare * policy.stepsShortfallFactor) {
      recs.push(
        `Average daily steps for ${person} are below the weekly target. ` +
          "Consider adding a short walk or light activity to the routine.",
      );
    } else {
      recs.push(
        `${person} is close to or meeting the step goal. Maintain regular activity to keep this trend.`,
      );
    }

    if (activity.avgCalories > goals.dailyCaloriesTarget * policy.caloriesExcessFactor) {
      recs.push(
        `Average daily calories for ${person} exceed the target. ` +
          "Review diet, reduce sugary drinks and high-fat snacks.",
      );
    } else {
      recs.push(
        `Calorie intake for ${person} is within the expected range. Continue balanced meals.`,
      );
    }
  }

  if (adherence.total === 0) {
    recs.push(
      `No medication schedule found for ${person}. If medications are prescribed, please add them to the tracker.`,
    );
  } else if (adherence.pct < policy.adherenceThresholdPct) {
    recs.push(
      `Medication adherence for ${person} is around ${formatOneDecimal(adherence.pct)}%. ` +
        "Set reminders and keep medicines in a visible place to avoid missing doses.",
    );
  } else {
    recs.push(
      `${person} has good medication adherence (~${formatOneDecimal(adherence.pct)}%). Continue the current reminder strategy.`,
    );
  }

  if (recs.length === 0) recs.push(NOT_ENOUGH_DATA_MESSAGE);
  return recs;
}

/** Builds the rule input from rows already fetched for one person. */
export function buildRecommendationInput(
  person: string,
  metrics: HealthMetric[],
  meds: Medication[],
  goals: Goals,
  today: string,
): RecommendationInput {
  const avg = rollingAverages7d(metrics, today);
  return {
    person,
    activity: { metricCount: metrics.length, avgSteps: avg.avgSteps, avgCalories: avg.avgCalories },
    adherence: reduceAdherence(meds),
    goals,
  };
}

export async function recommendationsFor(
  store: HealthStore,
  person: string,
  today: string,
  policy: RecommendationPolicy = DEFAULT_RECOMMENDATION_POLICY,
): Promise<string[]> {
  const [metrics, meds, goals] = await Promise.all([
    store.listMetrics(person),
    store.listMedications(person),
    store.getGoals(),
  ]);
  return generateRecommendations(buildRecommendationInput(person, metrics, meds, goals, today), policy);
}
