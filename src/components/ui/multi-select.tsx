"use client";

import { useMemo, useState } from "react";
import { Check, X } from "lucide-react";

interface MultiSelectProps {
  label: string;
  options: string[];
  selected: string[];
  onChange: (next: string[]) => void;
  placeholder?: string;
}

export function MultiSelect({ label, options, selected, onChange, placeholder }: MultiSelectProps) {
  const [query, setQuery] = useState("");
  const chosen = useMemo(() => new Set(selected), [selected]);
  const visible = useMemo(() => {
    const q = query.trim().toLowerCase();
    return q ? options.filter((o) => o.toLowerCase().includes(q)) : options;
  }, [options, query]);

  const toggle = (option: string) => {
    onChange(chosen.has(option) ? selected.filter((s) => s !== option) : [...selected, option]);
  };

  return (
    <div className="space-y-2">
      <div className="flex items-center justify-between">
        <span className="text-xs font-medium uppercase tracking-wider text-zinc-500">{label}</span>
        {selected.length > 0 && (
          <button onClick={() => onChange([])} className="text-[10px] text-zinc-500 hover:text-zinc-300">
            Clear
          </button>
        )}
      </div>

      {selected.length > 0 && (
        <div className="flex flex-wrap gap-1">
          {selected.map((s) => (
            <span
              key={s}
              className="inline-flex items-center gap-1 rounded-md bg-red-500/15 px-2 py-0.5 text-[11px] text-red-300"
            >
              {s}
              <button onClick={() => toggle(s)} aria-label={`Remove ${s}`}>
                <X className="h-3 w-3" />
              </button>
            </span>
          ))}
        </div>
      )}

      <input
        value={query}
        onChange={(e) => setQuery(e.target.value)}
        placeholder={placeholder ?? "Search..."}
        aria-label={`Search ${label}`}
        className="w-full rounded-md border border-zinc-800 bg-zinc-900/50 px-2 py-1.5 text-xs text-white placeholder:text-zinc-600 focus:border-red-500/50 focus:outline-none"
      />

      <ul className="max-h-48 overflow-y-auto rounded-md border border-zinc-800/60">
        {visible.map((option) => (
          <li key={option}>
            <button
              onClick={() => toggle(option)}
              className="flex w-full items-center justify-between px-2 py-1 text-left text-xs text-zinc-400 hover:bg-zinc-800/60 hover:text-zinc-200"
            >
              <span className="truncate">{option}</span>
              {chosen.has(option) && <Check className="h-3 w-3 text-red-400" />}
            </button>
          </li>
        ))}
        {!visible.length && <li className="px-2 py-1 text-xs text-zinc-600">No matches</li>}
      </ul>
    </div>
  );
}
