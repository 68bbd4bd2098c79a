import { HISTORY_COLUMNS } from "@/story/lib/export/csv";
import type { GenerationResult } from "@/story/lib/types";

/**
 * Flat table of the session history, oldest first, with the same columns as
 * the CSV export. Long texts are clamped; the export carries them in full.
 */
export function HistoryTable({ results }: { results: readonly GenerationResult[] }) {
  return (
    <div className="overflow-x-auto rounded-md border">
      <table className="w-full text-sm" data-testid="history-table">
        <thead className="bg-muted/50">
          <tr>
            {HISTORY_COLUMNS.map((column) => (
              <th
                key={column.header}
                scope="col"
                className="px-3 py-2 text-left text-xs font-medium text-muted-foreground uppercase tracking-wider whitespace-nowrap"
              >
                {column.header}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {results.map((result) => (
            <tr key={result.id} className="border-t align-top" data-testid="history-row">
              {HISTORY_COLUMNS.map((column) => (
                <td key={column.header} className="px-3 py-2 max-w-[320px]">
                  <span className="line-clamp-4 whitespace-pre-line">{result[column.field]}</span>
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
