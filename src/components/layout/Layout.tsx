import React from "react";
import { Link, useLocation } from "react-router-dom";

export interface LayoutProps {
  children: React.ReactNode;
}

const NAV_LINKS = [
  { path: "/", label: "Portfolio" },
  { path: "/analysis", label: "Analysis" },
];

export function Layout({ children }: LayoutProps) {
  const location = useLocation();

  return (
    <div className="min-h-screen bg-rk-bg-primary text-rk-text-primary">
      <header className="border-b border-rk-border-subtle bg-rk-bg-surface">
        <div className="px-10 py-4">
          <div className="flex items-center justify-between">
            <Link to="/" className="flex items-center gap-3">
              <img src="/logo.svg" alt="Portfolio Risk Analyzer" className="h-8 w-8" />
              <span className="text-lg font-semibold">Portfolio Risk Analyzer</span>
            </Link>
            <nav className="flex gap-4">
              {NAV_LINKS.map((link) => (
                <Link
                  key={link.path}
                  to={link.path}
                  className={`rounded-md px-3 py-2 text-[13px] font-medium transition-colors ${
                    location.pathname === link.path
                      ? "border border-rk-accent-border bg-rk-accent-muted text-rk-accent-hover"
                      : "text-rk-text-secondary hover:bg-rk-bg-elevated hover:text-rk-text-primary"
                  }`}
                >
                  {link.label}
                </Link>
              ))}
            </nav>
          </div>
        </div>
      </header>
      <main className="px-10 py-8">{children}</main>
      <footer className="mt-12 border-t border-rk-border-subtle bg-rk-bg-surface">
        <div className="px-10 py-4">
          <p className="text-[11px] text-rk-text-tertiary">
            Market data is delayed and provided for analysis only. Holdings live in this browser tab.
          </p>
        </div>
      </footer>
    </div>
  );
}
