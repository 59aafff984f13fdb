export const SELF_PERSON = "Self";

export type Medication = {
  id: number;
  person: string;
  name: string;
  date: string;
  time: string;
  taken: boolean;
  caregiverContact: string | null;
};

export type NewMedication = Omit<Medication, "id" | "taken">;

export type HealthMetric = {
  id: number;
  person: string;
  date: string;
  steps: number;
  calories: number;
};

export type NewHealthMetric = Omit<HealthMetric, "id">;

export type Goals = {
  weeklyStepsTarget: number;
  dailyCaloriesTarget: number;
};

export const DEFAULT_GOALS: Goals = {
  weeklyStepsTarget: 35000,
  dailyCaloriesTarget: 2200,
};

/** Largest value a Postgres INTEGER/SERIAL column holds. */
export const MAX_STORED_INT = 2147483647;

/**
 * Persistence boundary. Handlers receive a store explicitly; the pg-backed
 * implementation acquires a pool connection per call.
 */
export interface HealthStore {
  listPeople(): Promise<string[]>;
  createPerson(name: string): Promise<boolean>;

  addMedication(input: NewMedication): Promise<Medication>;
  /** Ordered by date, time, id. All people when `person` is omitted. */
  listMedications(person?: string): Promise<Medication[]>;
  markMedicationTaken(id: number): Promise<number>;
  resetMedicationsTaken(person: string): Promise<number>;

  addMetric(input: NewHealthMetric): Promise<HealthMetric>;
  /** Inserts every row or none of them. */
  addMetrics(rows: NewHealthMetric[]): Promise<number>;
  /** Ordered by date, id. All people when `person` is omitted. */
  listMetrics(person?: string): Promise<HealthMetric[]>;

  getGoals(): Promise<Goals>;
  saveGoals(goals: Goals): Promise<Goals>;
}
