import type { Express, Request, Response } from "express";
import { createServer, type Server } from "node:http";
import multer from "multer";
import { todayISO } from "../lib/dates";
import { computeAdherence } from "./adherence";
import type { AppConfig } from "./config";
import { buildDashboard } from "./dashboard";
import { exportMedicationsCSV, exportMetricsCSV } from "./export";
import { goalProgress, weeklyStepTotals } from "./metrics-aggregator";
import {
  MetricsImportError,
  detectFormat,
  importMetricsFile,
  previewMetricsFile,
  type ImportFormat,
} from "./metrics-import";
import { recommendationsFor } from "./recommendations";
import { generateReportPdf } from "./report";
import { MAX_STORED_INT, type HealthStore } from "./types/health";
import {
  validateGoalsInput,
  validateMedicationInput,
  validateMetricInput,
  validatePersonName,
} from "./validation";

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 10 * 1024 * 1024 } });

export interface RouteContext {
  store: HealthStore;
  config: AppConfig;
  today?: () => string;
}

type UploadedText = { format: ImportFormat; text: string; person: string };

export function registerRoutes(app: Express, ctx: RouteContext): Server {
  const { store, config } = ctx;
  const today = ctx.today ?? (() => todayISO());

  const getPerson = (req: Request): string => {
    const fromQuery = typeof req.query.person === "string" ? req.query.person.trim() : "";
    return fromQuery || config.defaultPerson;
  };

  const readUpload = (req: Request, res: Response): UploadedText | null => {
    if (!req.file) {
      res.status(400).json({ error: "No file uploaded" });
      return null;
    }
    const explicit = typeof req.body?.format === "string" ? req.body.format : undefined;
    const format = detectFormat(req.file.originalname, explicit);
    if (!format) {
      res.status(400).json({ error: "Unsupported file type. Upload a .csv, .json or .xml file." });
      return null;
    }
    const bodyPerson = typeof req.body?.person === "string" ? req.body.person.trim() : "";
    return {
      format,
      text: req.file.buffer.toString("utf-8"),
      person: bodyPerson || getPerson(req),
    };
  };

  app.get("/api/people", async (_req: Request, res: Response) => {
    try {
      res.json(await store.listPeople());
    } catch (err: unknown) {
      console.error("people error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/people", async (req: Request, res: Response) => {
    try {
      const parsed = validatePersonName(req.body);
      if (!parsed.ok) {
        return res.status(400).json({ error: "Invalid person", details: parsed.errors });
      }
      const created = await store.createPerson(parsed.value);
      res.status(created ? 201 : 200).json({ ok: true, name: parsed.value, created });
    } catch (err: unknown) {
      console.error("create person error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/dashboard", async (req: Request, res: Response) => {
    try {
      const dashboard = await buildDashboard(store, getPerson(req), {
        today: today(),
        weekGrouping: config.weekGrouping,
      });
      res.json(dashboard);
    } catch (err: unknown) {
      console.error("dashboard error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/medications", async (req: Request, res: Response) => {
    try {
      res.json(await store.listMedications(getPerson(req)));
    } catch (err: unknown) {
      console.error("medications error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/medications", async (req: Request, res: Response) => {
    try {
      const parsed = validateMedicationInput(req.body, getPerson(req), today());
      if (!parsed.ok) {
        return res.status(400).json({ error: "Invalid medication", details: parsed.errors });
      }
      const med = await store.addMedication(parsed.value);
      res.status(201).json(med);
    } catch (err: unknown) {
      console.error("add medication error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/medications/reset-taken", async (req: Request, res: Response) => {
    try {
      const person = getPerson(req);
      const updated = await store.resetMedicationsTaken(person);
      res.json({ ok: true, person, updated });
    } catch (err: unknown) {
      console.error("reset-taken error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/medications/:id/taken", async (req: Request, res: Response) => {
    try {
      const id = Number(req.params.id);
      if (!Number.isInteger(id) || id < 1) {
        return res.status(400).json({ error: "id must be a positive integer" });
      }
      // Ids past the INTEGER column range cannot exist.
      const updated = id > MAX_STORED_INT ? 0 : await store.markMedicationTaken(id);
      res.json({ ok: true, id, updated });
    } catch (err: unknown) {
      console.error("mark taken error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/adherence", async (req: Request, res: Response) => {
    try {
      const scope = typeof req.query.person === "string" && req.query.person.trim()
        ? req.query.person.trim()
        : undefined;
      res.json({ person: scope ?? null, ...(await computeAdherence(store, scope)) });
    } catch (err: unknown) {
      console.error("adherence error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/metrics", async (req: Request, res: Response) => {
    try {
      res.json(await store.listMetrics(getPerson(req)));
    } catch (err: unknown) {
      console.error("metrics error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/metrics", async (req: Request, res: Response) => {
    try {
      const parsed = validateMetricInput(req.body, getPerson(req), today());
      if (!parsed.ok) {
        return res.status(400).json({ error: "Invalid metrics", details: parsed.errors });
      }
      const metric = await store.addMetric(parsed.value);
      res.status(201).json(metric);
    } catch (err: unknown) {
      console.error("add metric error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/import/preview", upload.single("file"), (req: Request, res: Response) => {
    try {
      const uploaded = readUpload(req, res);
      if (!uploaded) return;
      res.json(previewMetricsFile(uploaded.format, uploaded.text));
    } catch (err: unknown) {
      if (err instanceof MetricsImportError) {
        return res.status(400).json({ error: err.message });
      }
      console.error("import preview error:", err);
      res.status(500).json({ error: "Preview failed" });
    }
  });

  app.post("/api/import", upload.single("file"), async (req: Request, res: Response) => {
    try {
      const uploaded = readUpload(req, res);
      if (!uploaded) return;
      const result = await importMetricsFile(store, uploaded.format, uploaded.text, uploaded.person);
      res.json(result);
    } catch (err: unknown) {
      if (err instanceof MetricsImportError) {
        return res.status(400).json({ error: err.message });
      }
      console.error("import error:", err);
      res.status(500).json({ error: "Import failed" });
    }
  });

  app.get("/api/export/medications.csv", async (_req: Request, res: Response) => {
    try {
      const csv = await exportMedicationsCSV(store);
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", 'attachment; filename="medications.csv"');
      res.send(csv);
    } catch (err: unknown) {
      console.error("export medications error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/export/metrics.csv", async (_req: Request, res: Response) => {
    try {
      const csv = await exportMetricsCSV(store);
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", 'attachment; filename="metrics.csv"');
      res.send(csv);
    } catch (err: unknown) {
      console.error("export metrics error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/goals", async (_req: Request, res: Response) => {
    try {
      res.json(await store.getGoals());
    } catch (err: unknown) {
      console.error("goals error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.put("/api/goals", async (req: Request, res: Response) => {
    try {
      const parsed = validateGoalsInput(req.body);
      if (!parsed.ok) {
        return res.status(400).json({ error: "Invalid goals", details: parsed.errors });
      }
      res.json(await store.saveGoals(parsed.value));
    } catch (err: unknown) {
      console.error("save goals error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/goals/progress", async (req: Request, res: Response) => {
    try {
      const person = getPerson(req);
      const [metrics, goals] = await Promise.all([store.listMetrics(person), store.getGoals()]);
      res.json({
        person,
        ...goalProgress(metrics, goals, config.weekGrouping),
        weeks: weeklyStepTotals(metrics, config.weekGrouping),
      });
    } catch (err: unknown) {
      console.error("goal progress error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/insights", async (req: Request, res: Response) => {
    try {
      const person = getPerson(req);
      res.json({ person, recommendations: await recommendationsFor(store, person, today()) });
    } catch (err: unknown) {
      console.error("insights error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/report.pdf", async (req: Request, res: Response) => {
    try {
      const pdf = await generateReportPdf(store, getPerson(req), today());
      res.setHeader("Content-Type", "application/pdf");
      res.setHeader("Content-Disposition", 'attachment; filename="health_report.pdf"');
      res.send(pdf);
    } catch (err: unknown) {
      console.error("report error:", err);
      res.status(500).json({ error: "Report generation failed" });
    }
  });

  return createServer(app);
}
