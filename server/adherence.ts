import type { HealthStore, Medication } from "./types/health";

export interface AdherenceSummary {
  taken: number;
  total: number;
  pct: number;
}

export interface PersonAdherence extends AdherenceSummary {
  person: string;
}

export function reduceAdherence(meds: Pick<Medication, "taken">[]): AdherenceSummary {
  const total = meds.length;
  if (total === 0) return { taken: 0, total: 0, pct: 0 };
  const taken = meds.filter((m) => m.taken).length;
  return { taken, total, pct: (taken / total) * 100 };
}

export function reduceAdherenceByPerson(meds: Medication[]): PersonAdherence[] {
  const byPerson = new Map<string, Medication[]>();
  for (const m of meds) {
    const list = byPerson.get(m.person) ?? [];
    list.push(m);
    byPerson.set(m.person, list);
  }
  return [...byPerson.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([person, list]) => ({ person, ...reduceAdherence(list) }));
}

export async function computeAdherence(
  store: HealthStore,
  person?: string,
): Promise<AdherenceSummary> {
  const meds = await store.listMedications(person);
  return reduceAdherence(meds);
}
