import type { GenerationResult } from "../types";
import { downloadBlob } from "@/shared/lib/downloadBlob";

export const EXPORT_FILENAME = "image_text_results.csv";

/** CSV header names and the record field each column reads. */
export const HISTORY_COLUMNS: ReadonlyArray<{ header: string; field: keyof GenerationResult }> = [
  { header: "timestamp", field: "timestamp" },
  { header: "filename", field: "filename" },
  { header: "tone", field: "tone" },
  { header: "length", field: "length" },
  { header: "type", field: "contentType" },
  { header: "prompt", field: "prompt" },
  { header: "image_description", field: "imageDescription" },
  { header: "generated_text", field: "generatedText" },
];

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Serialises the history as CSV: one header row, then one row per result in
 * history order. Every field is quoted so embedded commas, quotes and line
 * breaks survive.
 */
export function historyToCsv(results: readonly GenerationResult[]): string {
  const header = HISTORY_COLUMNS.map((c) => quote(c.header)).join(",");
  const rows = results.map((result) =>
    HISTORY_COLUMNS.map((c) => quote(result[c.field])).join(",")
  );
  return [header, ...rows].join("\n");
}

/** Triggers a browser download of the whole history. */
export function exportHistory(results: readonly GenerationResult[]): void {
  const blob = new Blob([historyToCsv(results)], { type: "text/csv;charset=utf-8" });
  downloadBlob(blob, EXPORT_FILENAME);
}
