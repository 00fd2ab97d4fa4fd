"use client";

import { memo, useEffect, useState } from "react";
import { ResponsiveChoropleth } from "@nivo/geo";
import { Pause, Play } from "lucide-react";
import { NIVO_THEME, formatEmissions } from "@/lib/chart-utils";
import type { WorldRegion } from "@/lib/data/world-regions";
import type { ChoroplethChartSpec } from "@/lib/types";

const FRAME_MS = 800;

interface EmissionsMapProps {
  spec: ChoroplethChartSpec;
}

function useWorldRegions() {
  const [features, setFeatures] = useState<WorldRegion[] | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancel = false;
    (async () => {
      try {
        const res = await fetch("/api/geo");
        if (!res.ok) throw new Error(`HTTP ${res.status}: ${res.statusText}`);
        const payload: { features?: WorldRegion[] } = await res.json();
        if (!cancel) setFeatures(payload.features ?? []);
      } catch (e: unknown) {
        if (!cancel) setError(e instanceof Error ? e.message : "Error desconocido");
      }
    })();
    return () => {
      cancel = true;
    };
  }, []);

  return { features, error };
}

function EmissionsMapInner({ spec }: EmissionsMapProps) {
  const { features, error } = useWorldRegions();
  const [frameIndex, setFrameIndex] = useState(0);
  const [playing, setPlaying] = useState(false);

  const lastIndex = spec.frames.length - 1;
  const current = spec.frames[Math.min(frameIndex, Math.max(lastIndex, 0))];

  // Nuevo spec (cambio de filtros): arrancar del primer anio
  useEffect(() => {
    setFrameIndex(0);
    setPlaying(false);
  }, [spec]);

  useEffect(() => {
    if (!playing) return;
    const timer = setInterval(() => {
      setFrameIndex((i) => {
        if (i >= lastIndex) {
          setPlaying(false);
          return i;
        }
        return i + 1;
      });
    }, FRAME_MS);
    return () => clearInterval(timer);
  }, [playing, lastIndex]);

  if (!current) {
    return (
      <div className="rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
        <p className="text-sm text-zinc-400">No data for the map</p>
      </div>
    );
  }

  return (
    <div className="w-full rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
      <div className="mb-3 flex items-center justify-between gap-4">
        <h3 className="text-base font-semibold text-white">{spec.title}</h3>
        <span className="font-mono text-sm text-zinc-300">{current.year}</span>
      </div>
      <div style={{ height: spec.layout.height - 80 }}>
        {error ? (
          <p className="text-sm text-amber-400">Map unavailable: {error}</p>
        ) : !features ? (
          <p className="text-sm text-zinc-500">Loading map...</p>
        ) : (
          <ResponsiveChoropleth
            features={features}
            data={current.data.map((d) => ({ id: d.id, value: d.value }))}
            domain={spec.color.domain}
            colors={spec.color.scale === "Reds" ? "reds" : "viridis"}
            unknownColor="#27272a"
            label="properties.name"
            valueFormat={(v) => formatEmissions(v)}
            projectionScale={110}
            projectionTranslation={[0.5, 0.6]}
            borderWidth={0.4}
            borderColor="#3f3f46"
            theme={NIVO_THEME}
          />
        )}
      </div>
      <div className="mt-3 flex items-center gap-3">
        <button
          onClick={() => {
            if (frameIndex >= lastIndex) setFrameIndex(0);
            setPlaying((p) => !p);
          }}
          aria-label={playing ? "Pause animation" : "Play animation"}
          className="rounded-lg bg-zinc-800 p-2 transition-colors hover:bg-zinc-700"
        >
          {playing ? <Pause className="h-4 w-4 text-zinc-300" /> : <Play className="h-4 w-4 text-zinc-300" />}
        </button>
        <input
          type="range"
          min={0}
          max={lastIndex}
          value={Math.min(frameIndex, lastIndex)}
          onChange={(e) => {
            setPlaying(false);
            setFrameIndex(Number(e.target.value));
          }}
          aria-label="Year"
          className="flex-1 accent-red-500"
        />
      </div>
      {spec.unresolved.length > 0 && (
        <p className="mt-2 text-[11px] text-zinc-500">
          Not shown on map: {spec.unresolved.join(", ")}
        </p>
      )}
    </div>
  );
}

export const EmissionsMap = memo(EmissionsMapInner);
export default EmissionsMap;
