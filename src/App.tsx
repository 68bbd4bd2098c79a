import { useEffect, type ReactNode } from "react";
import { BrowserRouter, Routes, Route, Navigate, Link, useLocation } from "react-router-dom";
import { BookOpenText, Bug, History as HistoryIcon, Sparkles } from "lucide-react";
import { NavMenu, type MenuItem } from "@/shared/components/NavMenu";
import { useReportBug } from "@/shared/hooks/useReportBug";
import { log } from "@/shared/lib/actionLog";
import type { LLMClient } from "@/shared/lib/llm/types";
import { SessionProvider } from "@/story/context/SessionContext";
import Generator from "@/story/pages/Generator";
import History from "@/story/pages/History";

/**
 * Logs every route change to the in-memory action log.
 * Must be rendered inside BrowserRouter so useLocation is available.
 */
function RouteLogger() {
  const location = useLocation();
  useEffect(() => {
    log({
      category: "navigation",
      action: "navigate",
      data: { path: location.pathname, search: location.search },
    });
  }, [location.pathname, location.search]);
  return null;
}

const NAV_ITEMS: MenuItem[] = [
  {
    label: "Generate",
    href: "/",
    icon: Sparkles,
    "data-testid": "nav-menu-generate",
  },
  {
    label: "History",
    href: "/history",
    icon: HistoryIcon,
    "data-testid": "nav-menu-history",
  },
  {
    label: "Report Bug",
    icon: Bug,
    isReportBug: true,
    "data-testid": "nav-menu-report-bug",
  },
];

function TopBar() {
  const { handleReportBug } = useReportBug();
  return (
    <header
      className="sticky top-0 z-40 flex items-center justify-between h-14 px-4 border-b bg-background/95 backdrop-blur-sm gap-4"
      data-testid="top-bar"
    >
      <Link
        to="/"
        className="flex items-center gap-2 shrink-0 hover:opacity-75 transition-opacity"
        aria-label="Image Story Studio home"
      >
        <div className="w-7 h-7 rounded-md bg-primary flex items-center justify-center shrink-0">
          <BookOpenText className="h-3.5 w-3.5 text-primary-foreground" />
        </div>
        <span className="font-semibold text-sm hidden sm:inline">Image Story Studio</span>
      </Link>
      <NavMenu items={NAV_ITEMS} onReportBug={handleReportBug} />
    </header>
  );
}

function PageLayout({ children }: { children: ReactNode }) {
  return (
    <div className="flex flex-col min-h-screen">
      <TopBar />
      <main className="flex-1 overflow-auto">{children}</main>
    </div>
  );
}

/**
 * The session provider sits above the routes so the history survives
 * navigation between the generator and the history table.
 */
export default function App({ client }: { client: LLMClient }) {
  return (
    <BrowserRouter basename={import.meta.env.BASE_URL}>
      <RouteLogger />
      <SessionProvider client={client}>
        <PageLayout>
          <Routes>
            <Route path="/" element={<Generator />} />
            <Route path="/history" element={<History />} />
            <Route path="*" element={<Navigate to="/" replace />} />
          </Routes>
        </PageLayout>
      </SessionProvider>
    </BrowserRouter>
  );
}
