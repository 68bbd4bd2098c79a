import { Component, type ErrorInfo, type ReactNode } from "react";
import { log } from "@/shared/lib/actionLog";

interface Props {
  children: ReactNode;
}

interface State {
  error: Error | null;
}

/**
 * Catches unhandled rendering errors and shows a recovery screen.
 * Refreshing starts a new session, so the on-screen copy says the history
 * will be lost. Dev builds show the message and echo it to the console.
 */
export class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    log({
      category: "error",
      action: "render:error",
      data: { error: error.message, componentStack: info.componentStack ?? null },
    });
    if (!import.meta.env.PROD) {
      console.error("[ErrorBoundary] Caught error:", error, info.componentStack);
    }
  }

  render() {
    const { error } = this.state;
    if (!error) return this.props.children;

    return (
      <div className="flex flex-col items-center justify-center min-h-screen gap-4 p-8 text-center">
        <h1 className="text-2xl font-semibold">Something went wrong</h1>
        <p className="text-muted-foreground max-w-md">
          An unexpected error occurred. Refresh the page to continue; this session&apos;s
          history will be cleared.
        </p>
        {!import.meta.env.PROD && (
          <pre className="text-xs text-left bg-muted rounded p-4 max-w-xl overflow-auto max-h-48">
            {error.message}
          </pre>
        )}
        <button
          className="mt-2 px-4 py-2 rounded bg-primary text-primary-foreground text-sm font-medium hover:opacity-90 transition-opacity"
          onClick={() => window.location.reload()}
        >
          Refresh
        </button>
      </div>
    );
  }
}
