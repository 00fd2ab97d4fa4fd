"use client";

import { RotateCcw } from "lucide-react";
import { chartRows } from "@/lib/chart-utils";
import type { ChartSpec } from "@/lib/types";

interface DataFallbackProps {
  chart: ChartSpec;
  reason: string;
  onRetry?: () => void;
}

/** Tabla con las filas del chart cuando no se puede dibujar. */
export function DataFallback({ chart, reason, onRetry }: DataFallbackProps) {
  const rows = chartRows(chart);
  const columns = rows.length ? Object.keys(rows[0]) : [];

  return (
    <div className="rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
      <div className="mb-2 flex items-center justify-between gap-2">
        <h3 className="text-base font-semibold text-white">{chart.title}</h3>
        {onRetry && (
          <button
            onClick={onRetry}
            className="inline-flex items-center gap-1.5 rounded-md bg-zinc-800 px-3 py-1.5 text-xs font-medium text-zinc-300 transition-colors hover:bg-zinc-700 hover:text-white"
          >
            <RotateCcw className="h-3 w-3" />
            Retry
          </button>
        )}
      </div>
      <p className="mb-3 text-xs text-amber-400">Chart unavailable: {reason}</p>
      {rows.length > 0 && (
        <div className="max-h-[300px] overflow-auto">
          <table className="w-full text-xs text-zinc-300">
            <thead>
              <tr className="border-b border-zinc-700">
                {columns.map((key) => (
                  <th key={key} className="px-2 py-1 text-left font-medium text-zinc-400">
                    {key}
                  </th>
                ))}
              </tr>
            </thead>
            <tbody>
              {rows.slice(0, 20).map((row, i) => (
                <tr key={i} className="border-b border-zinc-800/50">
                  {columns.map((key) => {
                    const val = row[key];
                    return (
                      <td key={key} className="px-2 py-1">
                        {typeof val === "number" ? val.toLocaleString("en-US") : (val ?? "")}
                      </td>
                    );
                  })}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}
    </div>
  );
}
