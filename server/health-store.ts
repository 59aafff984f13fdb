import type pg from "pg";
import {
  DEFAULT_GOALS,
  SELF_PERSON,
  type Goals,
  type HealthMetric,
  type HealthStore,
  type Medication,
  type NewHealthMetric,
  type NewMedication,
} from "./types/health";

type MedicationRow = {
  id: number;
  person: string;
  name: string;
  date: string;
  time: string;
  taken: boolean;
  caregiver_email: string | null;
};

type MetricRow = {
  id: number;
  person: string;
  date: string;
  steps: number;
  calories: number;
};

type GoalsRow = {
  weekly_steps_target: number;
  daily_calories_target: number;
};

function toMedication(r: MedicationRow): Medication {
  return {
    id: Number(r.id),
    person: r.person,
    name: r.name,
    date: r.date,
    time: r.time,
    taken: r.taken,
    caregiverContact: r.caregiver_email,
  };
}

function toMetric(r: MetricRow): HealthMetric {
  return {
    id: Number(r.id),
    person: r.person,
    date: r.date,
    steps: Number(r.steps),
    calories: Number(r.calories),
  };
}

export class PgHealthStore implements HealthStore {
  constructor(private readonly pool: pg.Pool) {}

  async listPeople(): Promise<string[]> {
    const { rows } = await this.pool.query<{ person: string }>(
      `SELECT name AS person FROM people
       UNION SELECT DISTINCT person FROM medications
       UNION SELECT DISTINCT person FROM health_metrics`,
    );
    const people = new Set<string>([SELF_PERSON]);
    for (const r of rows) people.add(r.person);
    return [...people].sort();
  }

  async createPerson(name: string): Promise<boolean> {
    const result = await this.pool.query(
      `INSERT INTO people (name) VALUES ($1) ON CONFLICT (name) DO NOTHING`,
      [name],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async addMedication(input: NewMedication): Promise<Medication> {
    const { rows } = await this.pool.query<MedicationRow>(
      `INSERT INTO medications (person, name, date, time, taken, caregiver_email)
       VALUES ($1, $2, $3, $4, false, $5)
       RETURNING *`,
      [input.person, input.name, input.date, input.time, input.caregiverContact],
    );
    return toMedication(rows[0]);
  }

  async listMedications(person?: string): Promise<Medication[]> {
    const { rows } = person
      ? await this.pool.query<MedicationRow>(
          `SELECT * FROM medications WHERE person = $1 ORDER BY date, time, id`,
          [person],
        )
      : await this.pool.query<MedicationRow>(
          `SELECT * FROM medications ORDER BY date, time, id`,
        );
    return rows.map(toMedication);
  }

  async markMedicationTaken(id: number): Promise<number> {
    const result = await this.pool.query(
      `UPDATE medications SET taken = true WHERE id = $1`,
      [id],
    );
    return result.rowCount ?? 0;
  }

  async resetMedicationsTaken(person: string): Promise<number> {
    const result = await this.pool.query(
      `UPDATE medications SET taken = false WHERE person = $1`,
      [person],
    );
    return result.rowCount ?? 0;
  }

  async addMetric(input: NewHealthMetric): Promise<HealthMetric> {
    const { rows } = await this.pool.query<MetricRow>(
      `INSERT INTO health_metrics (person, date, steps, calories)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [input.person, input.date, input.steps, input.calories],
    );
    return toMetric(rows[0]);
  }

  async addMetrics(rows: NewHealthMetric[]): Promise<number> {
    if (rows.length === 0) return 0;
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      for (const r of rows) {
        await client.query(
          `INSERT INTO health_metrics (person, date, steps, calories) VALUES ($1, $2, $3, $4)`,
          [r.person, r.date, r.steps, r.calories],
        );
      }
      await client.query("COMMIT");
      return rows.length;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  async listMetrics(person?: string): Promise<HealthMetric[]> {
    const { rows } = person
      ? await this.pool.query<MetricRow>(
          `SELECT * FROM health_metrics WHERE person = $1 ORDER BY date, id`,
          [person],
        )
      : await this.pool.query<MetricRow>(
          `SELECT * FROM health_metrics ORDER BY date, id`,
        );
    return rows.map(toMetric);
  }

  async getGoals(): Promise<Goals> {
    const { rows } = await this.pool.query<GoalsRow>(
      `SELECT weekly_steps_target, daily_calories_target FROM goals WHERE id = 1`,
    );
    if (rows.length === 0) return { ...DEFAULT_GOALS };
    return {
      weeklyStepsTarget: Number(rows[0].weekly_steps_target),
      dailyCaloriesTarget: Number(rows[0].daily_calories_target),
    };
  }

  async saveGoals(goals: Goals): Promise<Goals> {
    await this.pool.query(
      `INSERT INTO goals (id, weekly_steps_target, daily_calories_target)
       VALUES (1, $1, $2)
       ON CONFLICT (id) DO UPDATE SET
         weekly_steps_target = EXCLUDED.weekly_steps_target,
         daily_calories_target = EXCLUDED.daily_calories_target`,
      [goals.weeklyStepsTarget, goals.dailyCaloriesTarget],
    );
    return { ...goals };
  }
}
