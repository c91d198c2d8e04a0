import { z } from "zod";
import { renderTables } from "./chunking/format.js";
import type { LlmGateway } from "./llm-gateway.js";
import type { Analysis, LogFn, RawDocument, StructuredSummary } from "./types.js";

export interface AnalyzerOptions {
  /** Characters of the document shown to the model. */
  previewChars: number;
  model?: string;
  log?: LogFn;
}

const structuredSummarySchema = z.object({
  fields: z.record(z.string()).default({}),
  patterns: z.array(z.string()).default([]),
  suggestedQuestions: z.array(z.string()).default([]),
});

const EMPTY_SUMMARY: StructuredSummary = { fields: {}, patterns: [], suggestedQuestions: [] };

/** Pulls the outermost JSON object out of a reply that may wrap it in prose or fences. */
export function parseStructuredSummary(reply: string): StructuredSummary | null {
  const start = reply.indexOf("{");
  const end = reply.lastIndexOf("}");
  if (start < 0 || end <= start) return null;

  let json: unknown;
  try {
    json = JSON.parse(reply.slice(start, end + 1));
  } catch {
    return null;
  }
  const parsed = structuredSummarySchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export function previewOf(document: RawDocument, maxChars: number): string {
  const tables = renderTables(document.tables);
  const text = tables || document.rawText;
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

/**
 * Produces the AI interpretation that messy tabular documents need before
 * they can be chunked: a narrative analysis, a plain-language interpretation
 * and a structured column-by-column summary.
 */
export class DocumentAnalyzer {
  constructor(
    private readonly llm: LlmGateway,
    private readonly options: AnalyzerOptions,
  ) {}

  async analyze(document: RawDocument): Promise<Analysis> {
    const preview = previewOf(document, this.options.previewChars);
    const { model } = this.options;

    const summary = await this.llm.complete(
      "Analyze this messy/unorganized tabular data and describe:\n" +
        "1. What kind of data this appears to be\n" +
        "2. What each column might represent (make educated guesses)\n" +
        "3. Any patterns or structure you can identify\n" +
        "4. Potential issues with the data organization\n\n" +
        `Data:\n${preview}\n\nAnalysis:`,
      { model, temperature: 0.2, system: "You are an expert data analyst." },
    );

    const interpretation = await this.llm.complete(
      "Based on this data analysis, explain the data to a user who doesn't understand it:\n" +
        "1. What this data represents in simple terms\n" +
        "2. How to interpret the information\n" +
        "3. What questions they could ask about this data\n\n" +
        `Data Preview:\n${preview.slice(0, 3000)}\n\nAnalysis:\n${summary}\n\nExplanation:`,
      { model, temperature: 0.3 },
    );

    const structuredReply = await this.llm.complete(
      "Based on this data analysis, return a JSON object with exactly these keys:\n" +
        '- "fields": object mapping each column name to what it likely means\n' +
        '- "patterns": array of data types, patterns and issues observed\n' +
        '- "suggestedQuestions": array of questions users might ask about this data\n' +
        "Reply with the JSON object only.\n\n" +
        `Data Preview:\n${preview.slice(0, 3000)}\n\nAnalysis:\n${summary}`,
      { model, temperature: 0.2 },
    );

    let structuredSummary = parseStructuredSummary(structuredReply);
    if (!structuredSummary) {
      this.options.log?.(`RAG: structured summary for ${document.id} was not valid JSON, using empty summary`);
      structuredSummary = EMPTY_SUMMARY;
    }

    return {
      summary: summary.trim(),
      interpretation: interpretation.trim(),
      structuredSummary,
    };
  }
}
