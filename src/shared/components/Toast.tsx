/**
 * Dismissible toast, fixed bottom-right.
 *
 *   const [toast, showToast] = useToast();
 *   showToast({ message: "History exported" });
 *   showToast({ message: "Clipboard unavailable", variant: "error" });
 *   showToast(null); // dismiss
 */

import { useCallback, useEffect, useRef, useState } from "react";
import { cn } from "@/shared/lib/utils";

export interface ToastState {
  message: string;
  variant?: "default" | "error";
}

/**
 * Manages a single toast. showToast replaces the current one and restarts
 * the auto-dismiss timer (durationMs, default 3000ms); null dismisses it.
 */
export function useToast(durationMs = 3000): [
  ToastState | null,
  (toast: ToastState | null) => void
] {
  const [toast, setToastState] = useState<ToastState | null>(null);
  const timerRef = useRef<ReturnType<typeof setTimeout> | null>(null);

  const showToast = useCallback(
    (next: ToastState | null) => {
      if (timerRef.current !== null) {
        clearTimeout(timerRef.current);
        timerRef.current = null;
      }
      setToastState(next);
      if (next !== null) {
        timerRef.current = setTimeout(() => {
          setToastState(null);
          timerRef.current = null;
        }, durationMs);
      }
    },
    [durationMs]
  );

  useEffect(
    () => () => {
      if (timerRef.current !== null) clearTimeout(timerRef.current);
    },
    []
  );

  return [toast, showToast];
}

export function Toast({ toast, onDismiss }: { toast: ToastState | null; onDismiss: () => void }) {
  if (!toast) return null;

  return (
    <div
      role="status"
      aria-live="polite"
      data-testid="toast"
      className={cn(
        "fixed bottom-4 right-4 z-50 flex items-center gap-3 rounded-md border px-4 py-2 text-sm shadow-lg",
        toast.variant === "error"
          ? "border-destructive/30 bg-destructive/10 text-destructive"
          : "bg-background text-foreground"
      )}
    >
      <span>{toast.message}</span>
      <button
        type="button"
        aria-label="Dismiss notification"
        onClick={onDismiss}
        className="shrink-0 opacity-60 hover:opacity-100 transition-opacity focus:outline-none focus:ring-1 focus:ring-ring rounded"
      >
        ×
      </button>
    </div>
  );
}
