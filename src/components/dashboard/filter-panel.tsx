"use client";

import { RotateCcw } from "lucide-react";
import { MultiSelect } from "@/components/ui/multi-select";
import type { ComparisonMetric, DashboardFilters, FilterOptions } from "@/lib/types";

interface FilterPanelProps {
  options: FilterOptions;
  filters: DashboardFilters;
  onChange: <K extends keyof DashboardFilters>(key: K, value: DashboardFilters[K]) => void;
  onReset: () => void;
}

const METRICS: { value: ComparisonMetric; label: string }[] = [
  { value: "total", label: "Total" },
  { value: "average", label: "Average" },
];

export function FilterPanel({ options, filters, onChange, onReset }: FilterPanelProps) {
  const [from, to] = filters.yearRange;

  const setYear = (which: 0 | 1, raw: string) => {
    const year = Number(raw);
    if (!Number.isInteger(year)) return;
    // El rango nunca queda invertido
    const next: [number, number] = which === 0 ? [Math.min(year, to), to] : [from, Math.max(year, from)];
    onChange("yearRange", next);
  };

  return (
    <aside className="space-y-6">
      <div className="flex items-center justify-between">
        <h2 className="text-sm font-semibold text-white">Filters</h2>
        <button
          onClick={onReset}
          className="inline-flex items-center gap-1 rounded-md bg-zinc-800 px-2 py-1 text-[11px] text-zinc-300 hover:bg-zinc-700"
        >
          <RotateCcw className="h-3 w-3" />
          Reset
        </button>
      </div>

      <MultiSelect
        label="Countries"
        options={options.countries}
        selected={filters.countries}
        onChange={(next) => onChange("countries", next)}
        placeholder="Search countries..."
      />

      <MultiSelect
        label="Sectors"
        options={options.sectors}
        selected={filters.sectors}
        onChange={(next) => onChange("sectors", next)}
        placeholder="Search sectors..."
      />

      <div className="space-y-2">
        <span className="text-xs font-medium uppercase tracking-wider text-zinc-500">Years</span>
        <div className="flex items-center gap-2">
          <input
            type="number"
            min={options.minYear}
            max={options.maxYear}
            value={from}
            onChange={(e) => setYear(0, e.target.value)}
            aria-label="First year"
            className="w-full rounded-md border border-zinc-800 bg-zinc-900/50 px-2 py-1.5 text-xs text-white"
          />
          <span className="text-zinc-600">-</span>
          <input
            type="number"
            min={options.minYear}
            max={options.maxYear}
            value={to}
            onChange={(e) => setYear(1, e.target.value)}
            aria-label="Last year"
            className="w-full rounded-md border border-zinc-800 bg-zinc-900/50 px-2 py-1.5 text-xs text-white"
          />
        </div>
      </div>

      <div className="space-y-2">
        <span className="text-xs font-medium uppercase tracking-wider text-zinc-500">Comparison metric</span>
        <div className="grid grid-cols-2 gap-1 rounded-lg bg-zinc-900 p-1">
          {METRICS.map((m) => (
            <button
              key={m.value}
              onClick={() => onChange("metric", m.value)}
              className={`rounded-md px-2 py-1 text-xs transition-colors ${
                filters.metric === m.value ? "bg-red-600 text-white" : "text-zinc-400 hover:text-zinc-200"
              }`}
            >
              {m.label}
            </button>
          ))}
        </div>
      </div>
    </aside>
  );
}
