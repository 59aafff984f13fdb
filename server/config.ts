import type { WeekGrouping } from "./metrics-aggregator";
import { SELF_PERSON } from "./types/health";

export interface AppConfig {
  databaseUrl: string | undefined;
  port: number;
  weekGrouping: WeekGrouping;
  defaultPerson: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseInt(env.PORT || "5000", 10);
  const grouping = env.WEEK_GROUPING || "iso_week";
  if (grouping !== "iso_week" && grouping !== "iso_year_week") {
    throw new Error(`WEEK_GROUPING must be iso_week or iso_year_week, got "${grouping}"`);
  }
  return {
    databaseUrl: env.DATABASE_URL,
    port: isNaN(port) ? 5000 : port,
    weekGrouping: grouping,
    defaultPerson: env.DEFAULT_PERSON?.trim() || SELF_PERSON,
  };
}
