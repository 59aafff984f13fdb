import PdfPrinter from "pdfmake";
import type { Content, TDocumentDefinitions } from "pdfmake/interfaces";
import { formatOneDecimal } from "../lib/format";
import type { AdherenceSummary } from "./adherence";
import {
  buildRecommendationInput,
  generateRecommendations,
  type RecommendationPolicy,
} from "./recommendations";
import type { Goals, HealthMetric, HealthStore } from "./types/health";

export const REPORT_METRIC_LIMIT = 20;

export interface ReportContent {
  title: string;
  generatedOn: string;
  goalLines: string[];
  adherenceLine: string;
  metricLines: string[];
  insights: string[];
}

export interface ReportInput {
  person: string;
  generatedOn: string;
  goals: Goals;
  adherence: AdherenceSummary;
  metrics: HealthMetric[];
  insights: string[];
}

export function buildReportContent(input: ReportInput): ReportContent {
  const { person, generatedOn, goals, adherence, insights } = input;
  const recent = [...input.metrics]
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : a.id - b.id))
    .slice(-REPORT_METRIC_LIMIT);

  return {
    title: `Health Report – ${person}`,
    generatedOn: `Generated on: ${generatedOn}`,
    goalLines: [
      `Weekly Steps Goal: ${goals.weeklyStepsTarget}`,
      `Daily Calories Goal: ${goals.dailyCaloriesTarget}`,
    ],
    adherenceLine: `Medication adherence: ${formatOneDecimal(adherence.pct)}% (${adherence.taken}/${adherence.total})`,
    metricLines: recent.length > 0
      ? recent.map((m) => `${m.date} | steps=${m.steps} | calories=${m.calories}`)
      : ["No metrics recorded yet."],
    insights: [...insights],
  };
}

const fonts = {
  Helvetica: {
    normal: "Helvetica",
    bold: "Helvetica-Bold",
    italics: "Helvetica-Oblique",
    bolditalics: "Helvetica-BoldOblique",
  },
};

const printer = new PdfPrinter(fonts);

export function buildDocumentDefinition(report: ReportContent): TDocumentDefinitions {
  const content: Content[] = [
    { text: report.title, style: "title" },
    { text: report.generatedOn, style: "body" },
    ...report.goalLines.map((line): Content => ({ text: line, style: "body" })),
    { text: report.adherenceLine, style: "body", margin: [0, 0, 0, 8] },
    { text: "Recent Health Metrics", style: "section" },
    ...report.metricLines.map((line): Content => ({ text: line, style: "row" })),
    { text: "Health Insights", style: "section", margin: [0, 8, 0, 4] },
    { ul: report.insights, style: "row" },
  ];

  return {
    info: { title: report.title },
    pageSize: "A4",
    pageMargins: [40, 40, 40, 40],
    content,
    defaultStyle: { font: "Helvetica", fontSize: 10 },
    styles: {
      title: { fontSize: 16, bold: true, margin: [0, 0, 0, 6] },
      section: { fontSize: 12, bold: true, margin: [0, 4, 0, 4] },
      body: { fontSize: 11, lineHeight: 1.2 },
      row: { fontSize: 10, lineHeight: 1.3 },
    },
  };
}

export function renderReportPdf(report: ReportContent): Promise<Buffer> {
  const pdfDoc = printer.createPdfKitDocument(buildDocumentDefinition(report));

  return new Promise((resolve, reject) => {
    const chunks: Uint8Array[] = [];
    pdfDoc.on("data", (chunk: Uint8Array) => chunks.push(chunk));
    pdfDoc.on("end", () => resolve(Buffer.concat(chunks)));
    pdfDoc.on("error", reject);
    pdfDoc.end();
  });
}

export async function assembleReport(
  store: HealthStore,
  person: string,
  today: string,
  policy?: RecommendationPolicy,
): Promise<ReportContent> {
  const [metrics, meds, goals] = await Promise.all([
    store.listMetrics(person),
    store.listMedications(person),
    store.getGoals(),
  ]);
  const input = buildRecommendationInput(person, metrics, meds, goals, today);
  const insights = generateRecommendations(input, policy);
  return buildReportContent({ person, generatedOn: today, goals, adherence: input.adherence, metrics, insights });
}

export async function generateReportPdf(
  store: HealthStore,
  person: string,
  today: string,
): Promise<Buffer> {
  const report = await assembleReport(store, person, today);
  console.log(`[report] generating PDF for ${person}`, {
    metrics: report.metricLines.length,
    insights: report.insights.length,
  });
  return renderReportPdf(report);
}
