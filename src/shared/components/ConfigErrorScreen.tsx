import { KeyRound } from "lucide-react";
import type { ConfigError } from "@/shared/lib/errors";

/**
 * Rendered by main.tsx instead of the app when startup configuration fails.
 * The key lives in .env, which Vite only reads at startup, so the only fix is
 * editing the file and restarting the dev server.
 */
export function ConfigErrorScreen({ error }: { error: ConfigError }) {
  return (
    <div
      role="alert"
      data-testid="config-error-screen"
      className="flex flex-col items-center justify-center min-h-screen gap-4 p-8 text-center"
    >
      <div className="w-14 h-14 rounded-2xl bg-destructive/10 flex items-center justify-center">
        <KeyRound className="w-7 h-7 text-destructive" aria-hidden="true" />
      </div>
      <h1 className="text-2xl font-semibold">Configuration required</h1>
      <p className="text-muted-foreground max-w-md">{error.message}</p>
      <pre className="text-xs text-left bg-muted rounded p-4">
        {`# .env\n${error.key}=your-key-here`}
      </pre>
      <p className="text-xs text-muted-foreground max-w-md">
        To try the app without a key, start it with <code>npm run dev:mock</code>.
      </p>
    </div>
  );
}
