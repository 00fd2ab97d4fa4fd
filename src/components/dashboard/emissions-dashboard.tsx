"use client";

import { useDashboard } from "@/hooks/useDashboard";
import { DashboardPanel } from "./dashboard-panel";
import { FilterPanel } from "./filter-panel";
import type { DashboardFilters, DashboardSpec, FilterOptions } from "@/lib/types";

interface EmissionsDashboardProps {
  options: FilterOptions;
  initialFilters: DashboardFilters;
  initialSpec: DashboardSpec;
}

export function EmissionsDashboard({ options, initialFilters, initialSpec }: EmissionsDashboardProps) {
  const { filters, spec, isLoading, error, update, reset } = useDashboard(initialFilters, initialSpec);

  return (
    <div className="flex flex-col gap-6 md:flex-row">
      <div className="md:w-[280px] md:shrink-0">
        <FilterPanel options={options} filters={filters} onChange={update} onReset={reset} />
      </div>
      <div className="min-w-0 flex-1">
        <DashboardPanel spec={spec} loading={isLoading} error={error} />
      </div>
    </div>
  );
}
