import type { Server } from "node:http";
import { createApp } from "../app";
import type { AppConfig } from "../config";
import { MemoryHealthStore } from "./helpers/memory-store";

const CONFIG: AppConfig = {
  databaseUrl: undefined,
  port: 0,
  weekGrouping: "iso_week",
  defaultPerson: "Self",
};

let store: MemoryHealthStore;
let server: Server;
let base: string;

beforeEach(async () => {
  store = new MemoryHealthStore();
  server = createApp({ store, config: CONFIG, today: () => "2026-10-19" }).server;
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server has no port");
  base = `http://127.0.0.1:${addr.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function postJson(path: string, body: unknown, method = "POST") {
  return fetch(`${base}${path}`, {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

function upload(path: string, filename: string, content: string, fields: Record<string, string> = {}) {
  const form = new FormData();
  for (const [k, v] of Object.entries(fields)) form.append(k, v);
  form.append("file", new Blob([content], { type: "text/plain" }), filename);
  return fetch(`${base}${path}`, { method: "POST", body: form });
}

describe("medication routes", () => {
  test("rejects a medication without a name and writes nothing", async () => {
    const res = await postJson("/api/medications", { name: "", time: "08:30" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid medication",
      details: ["Please fill in at least medicine name and time."],
    });
    expect(store.medications).toHaveLength(0);
  });

  test("adherence for Self after one of two doses is taken", async () => {
    await postJson("/api/medications", { name: "Aspirin", time: "08:00" });
    const vitaminRes = await postJson("/api/medications", { name: "Vitamin", time: "09:00" });
    expect(vitaminRes.status).toBe(201);
    expect(await vitaminRes.json()).toEqual({
      id: 2,
      person: "Self",
      name: "Vitamin",
      date: "2026-10-19",
      time: "09:00",
      taken: false,
      caregiverContact: null,
    });

    const marked = await fetch(`${base}/api/medications/2/taken`, { method: "POST" });
    expect(await marked.json()).toEqual({ ok: true, id: 2, updated: 1 });

    const res = await fetch(`${base}/api/adherence?person=Self`);
    expect(await res.json()).toEqual({ person: "Self", taken: 1, total: 2, pct: 50 });
  });

  test("marking an unknown id is a no-op", async () => {
    const res = await fetch(`${base}/api/medications/999/taken`, { method: "POST" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, id: 999, updated: 0 });
  });

  test("an id past the stored integer range updates nothing", async () => {
    const res = await fetch(`${base}/api/medications/99999999999/taken`, { method: "POST" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, id: 99999999999, updated: 0 });
  });

  test("reset clears taken flags for the active person only", async () => {
    const a = await store.addMedication({ person: "Self", name: "A", date: "2026-10-19", time: "08:00", caregiverContact: null });
    const b = await store.addMedication({ person: "Mom", name: "B", date: "2026-10-19", time: "08:00", caregiverContact: null });
    await store.markMedicationTaken(a.id);
    await store.markMedicationTaken(b.id);

    const res = await fetch(`${base}/api/medications/reset-taken?person=Self`, { method: "POST" });
    expect(await res.json()).toEqual({ ok: true, person: "Self", updated: 1 });
    expect(store.medications.map((m) => m.taken)).toEqual([false, true]);
  });
});

describe("metric routes", () => {
  test("rejects a step count the database cannot store", async () => {
    const res = await postJson("/api/metrics", { steps: 3000000000, calories: 2000 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid metrics",
      details: ["steps: must be an integer from 0 to 2147483647, got 3000000000"],
    });
    expect(store.metrics).toHaveLength(0);
  });
});

describe("people routes", () => {
  test("creating a person does not create metric rows", async () => {
    const res = await postJson("/api/people", { name: " Mom " });
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ ok: true, name: "Mom", created: true });
    expect(store.metrics).toHaveLength(0);

    const people = await fetch(`${base}/api/people`);
    expect(await people.json()).toEqual(["Mom", "Self"]);
  });
});

describe("goal routes", () => {
  test("rejects an oversized weekly target", async () => {
    const res = await postJson("/api/goals", { weeklyStepsTarget: 1e10, dailyCaloriesTarget: 1800 }, "PUT");
    expect(res.status).toBe(400);
    expect(store.goals).toEqual({ weeklyStepsTarget: 35000, dailyCaloriesTarget: 2200 });
  });

  test("progress follows the newly saved weekly target", async () => {
    await store.addMetric({ person: "Self", date: "2026-10-19", steps: 10000, calories: 2000 });

    const before = await fetch(`${base}/api/goals/progress`);
    expect(await before.json()).toMatchObject({ weeklyTarget: 35000 });

    const saved = await postJson("/api/goals", { weeklyStepsTarget: 20000, dailyCaloriesTarget: 1800 }, "PUT");
    expect(await saved.json()).toEqual({ weeklyStepsTarget: 20000, dailyCaloriesTarget: 1800 });

    const after = await fetch(`${base}/api/goals/progress`);
    expect(await after.json()).toEqual({
      person: "Self",
      week: "43",
      weeklySteps: 10000,
      weeklyTarget: 20000,
      ratio: 0.5,
      weeks: [{ week: "43", steps: 10000 }],
    });
  });
});

describe("import and export routes", () => {
  test("an XML row without calories rejects the whole file", async () => {
    const xml =
      "<metrics>" +
      "<row><date>2026-10-17</date><steps>4000</steps><calories>1900</calories></row>" +
      "<row><date>2026-10-18</date><steps>5000</steps></row>" +
      "</metrics>";
    const res = await upload("/api/import", "week.xml", xml);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "XML import failed: row 2 is missing calories" });
    expect(store.metrics).toHaveLength(0);
  });

  test("imports a JSON file for the person named in the form", async () => {
    const json = JSON.stringify([
      { date: "2026-10-18", steps: 6200, calories: 2100 },
      { date: "2026-10-16", steps: 3100, calories: 1800 },
    ]);
    const res = await upload("/api/import", "dad.json", json, { person: "Dad" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      format: "json",
      person: "Dad",
      rowsImported: 2,
      dateRange: { start: "2026-10-16", end: "2026-10-18" },
    });
    expect(store.metrics.map((m) => m.person)).toEqual(["Dad", "Dad"]);
  });

  test("preview reports the row count without writing", async () => {
    const csv = "Date,Steps,Calories\n2026-10-18,100,200\n2026-10-19,300,400\n";
    const res = await upload("/api/import/preview", "log.csv", csv);
    expect(await res.json()).toEqual({
      format: "csv",
      rowCount: 2,
      rows: [
        { date: "2026-10-18", steps: 100, calories: 200 },
        { date: "2026-10-19", steps: 300, calories: 400 },
      ],
    });
    expect(store.metrics).toHaveLength(0);
  });

  test("an oversized count in an upload is a 400 naming the row", async () => {
    const csv = "date,steps,calories\n2026-10-18,3000000000,2000\n";
    const res = await upload("/api/import", "big.csv", csv);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'CSV import failed: row 1 has invalid steps "3000000000"' });
  });

  test("rejects an upload with an unknown extension", async () => {
    const res = await upload("/api/import", "notes.txt", "hello");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Unsupported file type. Upload a .csv, .json or .xml file." });
  });

  test("an exported metrics CSV imports back", async () => {
    await store.addMetric({ person: "Self", date: "2026-10-18", steps: 7000, calories: 2000 });
    await store.addMetric({ person: "Self", date: "2026-10-19", steps: 8000, calories: 2100 });

    const exported = await fetch(`${base}/api/export/metrics.csv`);
    expect(exported.headers.get("content-type")).toBe("text/csv; charset=utf-8");
    const csv = await exported.text();
    expect(csv).toBe(
      "id,person,date,steps,calories\n" +
        "1,Self,2026-10-18,7000,2000\n" +
        "2,Self,2026-10-19,8000,2100\n",
    );

    const res = await upload("/api/import", "metrics.csv", csv);
    expect(await res.json()).toMatchObject({ rowsImported: 2 });
    expect(store.metrics).toHaveLength(4);
  });
});

describe("report route", () => {
  test("returns a PDF document", async () => {
    await store.addMetric({ person: "Self", date: "2026-10-19", steps: 9000, calories: 2000 });
    const res = await fetch(`${base}/api/report.pdf`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/pdf");
    const bytes = Buffer.from(await res.arrayBuffer());
    expect(bytes.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });
});
