/**
 * Top-right circular navigation menu button.
 *
 * Purely presentational: receives menu items and an onReportBug callback from
 * the parent, so it has no hardcoded routes and no direct dependency on the
 * action log. The dropdown closes on outside click, on item click and on Escape.
 */

import type React from "react";
import { useEffect, useRef, useState } from "react";
import { Link } from "react-router-dom";
import { Menu } from "lucide-react";
import { Toast, useToast } from "@/shared/components/Toast";

export interface MenuItem {
  label: string;
  href?: string;
  icon: React.ElementType;
  /** Clicking this item invokes onReportBug and reports the outcome in a toast. */
  isReportBug?: boolean;
  "data-testid"?: string;
}

interface NavMenuProps {
  items: MenuItem[];
  onReportBug: () => Promise<void>;
}

const ITEM_CLASS =
  "flex items-center gap-2 w-full px-3 py-2 min-h-[44px] text-sm hover:bg-accent hover:text-accent-foreground transition-colors cursor-pointer text-left";

export function NavMenu({ items, onReportBug }: NavMenuProps) {
  const [open, setOpen] = useState(false);
  const [toast, showToast] = useToast(2500);
  const containerRef = useRef<HTMLDivElement>(null);

  async function handleReportBug() {
    setOpen(false);
    try {
      await onReportBug();
      showToast({ message: "Log copied" });
    } catch {
      showToast({ message: "Copy failed: clipboard unavailable", variant: "error" });
    }
  }

  useEffect(() => {
    if (!open) return;
    function handleClickOutside(e: MouseEvent) {
      const target = e.target;
      if (containerRef.current && target instanceof Node && !containerRef.current.contains(target)) {
        setOpen(false);
      }
    }
    function handleKeyDown(e: KeyboardEvent) {
      if (e.key === "Escape") setOpen(false);
    }
    document.addEventListener("mousedown", handleClickOutside);
    document.addEventListener("keydown", handleKeyDown);
    return () => {
      document.removeEventListener("mousedown", handleClickOutside);
      document.removeEventListener("keydown", handleKeyDown);
    };
  }, [open]);

  return (
    <div ref={containerRef} className="relative">
      <button
        type="button"
        aria-label="Open navigation menu"
        aria-expanded={open}
        aria-haspopup="menu"
        onClick={() => setOpen((prev) => !prev)}
        data-testid="nav-menu-trigger"
        className="h-9 w-9 min-h-[44px] min-w-[44px] rounded-full flex items-center justify-center border bg-background hover:bg-accent transition-colors focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-ring"
      >
        <Menu className="h-4 w-4" />
      </button>

      {open && (
        <div
          role="menu"
          data-testid="nav-menu-dropdown"
          className="absolute right-0 top-11 z-50 min-w-[160px] rounded-md border bg-background shadow-md py-1"
        >
          {items.map((item) => {
            const Icon = item.icon;

            if (item.href) {
              return (
                <Link
                  key={item.label}
                  to={item.href}
                  role="menuitem"
                  data-testid={item["data-testid"]}
                  className={ITEM_CLASS}
                  onClick={() => setOpen(false)}
                >
                  <Icon className="h-4 w-4 shrink-0" />
                  {item.label}
                </Link>
              );
            }

            return (
              <button
                key={item.label}
                type="button"
                role="menuitem"
                data-testid={item["data-testid"]}
                className={ITEM_CLASS}
                onClick={item.isReportBug ? () => void handleReportBug() : () => setOpen(false)}
              >
                <Icon className="h-4 w-4 shrink-0" />
                {item.label}
              </button>
            );
          })}
        </div>
      )}

      <Toast toast={toast} onDismiss={() => showToast(null)} />
    </div>
  );
}
