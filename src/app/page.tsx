import { Flame } from "lucide-react";
import { EmissionsDashboard } from "@/components/dashboard/emissions-dashboard";
import { getEmissionsTable } from "@/lib/data/emissions-table";
import { buildDashboard, defaultFilters, filterOptions } from "@/lib/emissions/dashboard";
import { DataSourceError } from "@/lib/emissions/errors";

// La tabla procesada se lee en runtime, no en build
export const dynamic = "force-dynamic";

function MissingData({ message }: { message: string }) {
  return (
    <div className="mx-auto mt-24 max-w-lg rounded-xl border border-zinc-800 bg-zinc-900/50 p-6 text-center">
      <h2 className="text-base font-semibold text-white">No processed data yet</h2>
      <p className="mt-2 text-sm text-zinc-400">{message}</p>
      <p className="mt-4 text-xs text-zinc-500">
        Run <code className="rounded bg-zinc-800 px-1.5 py-0.5 text-zinc-300">npm run etl</code> to build the
        processed table, then reload this page.
      </p>
    </div>
  );
}

export default async function HomePage() {
  let content: React.ReactNode;
  try {
    const table = await getEmissionsTable();
    const options = filterOptions(table);
    const filters = defaultFilters(options);
    content = (
      <EmissionsDashboard options={options} initialFilters={filters} initialSpec={buildDashboard(table, filters)} />
    );
  } catch (e: unknown) {
    if (!(e instanceof DataSourceError)) throw e;
    content = <MissingData message={e.message} />;
  }

  return (
    <div className="min-h-screen bg-zinc-950">
      <header className="flex h-14 items-center gap-2 border-b border-zinc-800/50 px-6">
        <div className="flex h-7 w-7 items-center justify-center rounded-lg bg-gradient-to-br from-red-600 to-amber-500">
          <Flame className="h-4 w-4 text-white" />
        </div>
        <span className="text-sm font-semibold text-white">
          Carbon<span className="text-zinc-400">Footprint</span>
        </span>
        <span className="ml-auto text-[10px] text-zinc-500">Tracking Global Carbon Footprints</span>
      </header>
      <main className="px-6 py-5">{content}</main>
    </div>
  );
}
