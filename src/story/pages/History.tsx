/**
 * History page.
 *
 * Route: /history
 *
 * Shows every result of the current session in generation order, with a CSV
 * download of the full table and a "Clear history" action. The history lives
 * only in memory, so it is empty after a reload.
 */

import { Link } from "react-router-dom";
import { Download, Trash2 } from "lucide-react";
import { Button } from "@/shared/components/ui/button";
import { Toast, useToast } from "@/shared/components/Toast";
import { log } from "@/shared/lib/actionLog";
import { errorMessage } from "@/shared/lib/errors";
import { HistoryTable } from "@/story/components/HistoryTable";
import { useHistory, useSession } from "@/story/context/SessionContext";
import { EXPORT_FILENAME, exportHistory } from "@/story/lib/export/csv";

export default function History() {
  const session = useSession();
  const results = useHistory();
  const [toast, showToast] = useToast();

  function handleExport() {
    log({
      category: "user:action",
      action: "history:export",
      data: { sessionId: session.id, rows: results.length },
    });
    try {
      exportHistory(results);
      showToast({ message: `Downloaded ${EXPORT_FILENAME}` });
    } catch (err) {
      log({ category: "error", action: "history:export:error", data: { error: errorMessage(err) } });
      showToast({ message: `Export failed: ${errorMessage(err)}`, variant: "error" });
    }
  }

  function handleClear() {
    log({
      category: "user:action",
      action: "history:clear",
      data: { sessionId: session.id, cleared: results.length },
    });
    session.history.clear();
  }

  return (
    <div className="p-4 md:p-8 flex flex-col gap-6">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <div>
          <h1 className="text-2xl font-bold tracking-tight">History</h1>
          <p className="text-muted-foreground text-sm mt-0.5">
            Results from this session. Nothing is kept after you close or reload the page.
          </p>
        </div>
        {results.length > 0 && (
          <div className="flex items-center gap-2">
            <Button variant="outline" onClick={handleClear} data-testid="clear-history-btn">
              <Trash2 className="h-4 w-4" aria-hidden="true" />
              Clear history
            </Button>
            <Button onClick={handleExport} data-testid="export-csv-btn">
              <Download className="h-4 w-4" aria-hidden="true" />
              Download all results as CSV
            </Button>
          </div>
        )}
      </div>

      {results.length > 0 ? (
        <HistoryTable results={results} />
      ) : (
        <div className="rounded-md border border-dashed p-10 text-center text-sm text-muted-foreground">
          No results yet.{" "}
          <Link to="/" className="text-primary hover:underline underline-offset-2">
            Generate your first one →
          </Link>
        </div>
      )}

      <Toast toast={toast} onDismiss={() => showToast(null)} />
    </div>
  );
}
