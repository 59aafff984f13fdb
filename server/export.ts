import { toCSV } from "../lib/csv";
import type { HealthStore } from "./types/health";

export const MEDICATION_COLUMNS = [
  "id", "person", "name", "date", "time", "taken", "caregiver_email",
] as const;

export const METRIC_COLUMNS = ["id", "person", "date", "steps", "calories"] as const;

export async function exportMedicationsCSV(store: HealthStore): Promise<string> {
  const meds = await store.listMedications();
  return toCSV(
    MEDICATION_COLUMNS,
    [...meds]
      .sort((a, b) => a.id - b.id)
      .map((m) => [m.id, m.person, m.name, m.date, m.time, m.taken ? 1 : 0, m.caregiverContact]),
  );
}

export async function exportMetricsCSV(store: HealthStore): Promise<string> {
  const metrics = await store.listMetrics();
  return toCSV(
    METRIC_COLUMNS,
    [...metrics]
      .sort((a, b) => a.id - b.id)
      .map((m) => [m.id, m.person, m.date, m.steps, m.calories]),
  );
}
