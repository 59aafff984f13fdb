import pg from "pg";

export function createPool(connectionString: string | undefined): pg.Pool {
  return new pg.Pool({ connectionString });
}

export async function runMigration(pool: pg.Pool, name: string, sql: string): Promise<void> {
  const { rows } = await pool.query(
    `SELECT id FROM schema_migrations WHERE name = $1`,
    [name]
  );
  if (rows.length > 0) return;
  console.log(`[migration] applying: ${name}`);
  await pool.query(sql);
  await pool.query(
    `INSERT INTO schema_migrations (name) VALUES ($1)`,
    [name]
  );
  console.log(`[migration] applied: ${name}`);
}

export async function initDb(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await runMigration(pool, "001_core_tables", `
    CREATE TABLE IF NOT EXISTS medications (
      id SERIAL PRIMARY KEY,
      person TEXT NOT NULL DEFAULT 'Self',
      name TEXT NOT NULL,
      date TEXT NOT NULL,
      time TEXT NOT NULL,
      taken BOOLEAN NOT NULL DEFAULT false,
      caregiver_email TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_medications_person ON medications(person);

    CREATE TABLE IF NOT EXISTS health_metrics (
      id SERIAL PRIMARY KEY,
      person TEXT NOT NULL DEFAULT 'Self',
      date TEXT NOT NULL,
      steps INTEGER NOT NULL DEFAULT 0,
      calories INTEGER NOT NULL DEFAULT 0
    );
    CREATE INDEX IF NOT EXISTS idx_health_metrics_person_date ON health_metrics(person, date);

    CREATE TABLE IF NOT EXISTS goals (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      weekly_steps_target INTEGER NOT NULL DEFAULT 35000,
      daily_calories_target INTEGER NOT NULL DEFAULT 2200
    );
    INSERT INTO goals (id) VALUES (1) ON CONFLICT (id) DO NOTHING;
  `);

  await runMigration(pool, "002_people", `
    CREATE TABLE IF NOT EXISTS people (
      name TEXT PRIMARY KEY,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
    INSERT INTO people (name) VALUES ('Self') ON CONFLICT (name) DO NOTHING;
  `);
}
