import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import "./index.css";
import App from "./App";
import { ConfigErrorScreen } from "@/shared/components/ConfigErrorScreen";
import { ErrorBoundary } from "@/shared/components/ErrorBoundary";
import { getAll as getActionLog, log } from "@/shared/lib/actionLog";
import { loadConfig } from "@/shared/lib/config";
import { ConfigError } from "@/shared/lib/errors";
import { createLLMClient } from "@/shared/lib/llm/factory";

// Expose the action log for debugging from the browser console.
declare global {
  interface Window {
    getActionLog: typeof getActionLog;
  }
}
window.getActionLog = getActionLog;

const rootEl = document.getElementById("root");
if (!rootEl) throw new Error("Root element not found");
const root = createRoot(rootEl);

// Fail fast: without a key (and outside mock mode) the UI never starts.
try {
  const config = loadConfig(import.meta.env);
  const client = createLLMClient(config);
  log({
    category: "session",
    action: "app:start",
    data: { model: config.model, mock: config.useMock },
  });
  root.render(
    <StrictMode>
      <ErrorBoundary>
        <App client={client} />
      </ErrorBoundary>
    </StrictMode>
  );
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  log({ category: "error", action: "app:config:error", data: { key: err.key } });
  console.error(`[config] ${err.message}`);
  root.render(<ConfigErrorScreen error={err} />);
}
