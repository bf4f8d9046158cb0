/**
 * Chart shell: title bar, chart area and readout.
 *
 * Owns the page-level concerns around a chart (title, description,
 * warnings) and leaves all radial geometry to the chart it wraps.
 */

import type { ReactNode } from "react";

// ─── ChartHeader ──────────────────────────────────────────────────────────────

/** Props for the ChartHeader component. */
interface ChartHeaderProps {
  readonly title: string;
  readonly description?: string;
  /** Diagnostic from the chart model, shown under the title */
  readonly warning?: string | null;
}

/** Title and description above the chart, with an optional warning line. */
export function ChartHeader({ title, description, warning }: ChartHeaderProps): React.ReactElement {
  return (
    <header className="flex flex-col gap-1 px-5 py-3 border-b border-chart-border">
      <h1 className="text-sm font-semibold tracking-widest uppercase text-chart-text">{title}</h1>
      {description && <p className="text-xs text-chart-muted">{description}</p>}
      {warning && (
        <p role="alert" className="text-[11px] text-accent-amber">
          {warning}
        </p>
      )}
    </header>
  );
}

// ─── ChartShell ───────────────────────────────────────────────────────────────

/** Props for the ChartShell component. */
interface ChartShellProps {
  readonly title: string;
  readonly description?: string;
  readonly warning?: string | null;
  /** The chart itself */
  readonly children: ReactNode;
  /** Content under the chart, typically the highlight readout */
  readonly footer?: ReactNode;
}

/**
 * Single-chart page layout.
 *
 * A header on top, the chart centred and capped in width, and a
 * footer row under it.
 */
export function ChartShell({
  title,
  description,
  warning,
  children,
  footer,
}: ChartShellProps): React.ReactElement {
  return (
    <div className="flex flex-col min-h-screen">
      <ChartHeader title={title} description={description} warning={warning} />

      <main className="flex-1 p-3 lg:p-4 flex flex-col items-center gap-3">
        <div className="glass-card w-full max-w-[40rem] p-3">{children}</div>
        {footer && <div className="w-full max-w-[40rem] flex justify-end">{footer}</div>}
      </main>
    </div>
  );
}
