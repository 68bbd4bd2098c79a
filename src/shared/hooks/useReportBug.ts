import { log, getAll } from "@/shared/lib/actionLog";

/**
 * Returns handleReportBug: logs the report:bug action, then copies every
 * in-memory action log entry to the clipboard as JSON. NavMenu shows the
 * success/failure toast based on whether the clipboard write resolves.
 */
export function useReportBug() {
  async function handleReportBug() {
    log({ category: "user:action", action: "report:bug", data: { entries: getAll().length } });
    await navigator.clipboard.writeText(JSON.stringify(getAll(), null, 2));
  }

  return { handleReportBug };
}
