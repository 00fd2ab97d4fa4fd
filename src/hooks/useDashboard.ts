"use client";

import { useState, useEffect, useRef, useCallback } from "react";
import type { DashboardFilters, DashboardSpec } from "@/lib/types";

const DEBOUNCE_MS = 300;

/**
 * Estado de filtros + dashboard. Cada cambio de filtros recalcula todos los
 * charts en el server; una respuesta vieja nunca pisa a una mas nueva.
 */
export function useDashboard(initialFilters: DashboardFilters, initialSpec: DashboardSpec) {
  const [filters, setFilters] = useState<DashboardFilters>(initialFilters);
  const [spec, setSpec] = useState<DashboardSpec>(initialSpec);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const firstRun = useRef(true);

  useEffect(() => {
    // El spec inicial ya viene renderizado del server
    if (firstRun.current) {
      firstRun.current = false;
      return;
    }

    const controller = new AbortController();
    const timer = setTimeout(async () => {
      setIsLoading(true);
      try {
        const res = await fetch("/api/dashboard", {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(filters),
          signal: controller.signal,
        });
        if (!res.ok) {
          const body: { error?: string } = await res.json().catch(() => ({}));
          throw new Error(body.error ?? `HTTP ${res.status}`);
        }
        const next: DashboardSpec = await res.json();
        setSpec(next);
        setError(null);
      } catch (e: unknown) {
        if (controller.signal.aborted) return;
        setError(e instanceof Error ? e.message : "Error desconocido");
      } finally {
        if (!controller.signal.aborted) setIsLoading(false);
      }
    }, DEBOUNCE_MS);

    return () => {
      clearTimeout(timer);
      controller.abort();
    };
  }, [filters]);

  const update = useCallback(<K extends keyof DashboardFilters>(key: K, value: DashboardFilters[K]) => {
    setFilters((prev) => ({ ...prev, [key]: value }));
  }, []);

  const reset = useCallback(() => setFilters(initialFilters), [initialFilters]);

  return { filters, spec, isLoading, error, update, reset };
}
