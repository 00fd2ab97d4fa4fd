import { getEmissionsTable } from "@/lib/data/emissions-table";
import { buildDashboard, dashboardFiltersSchema } from "@/lib/emissions/dashboard";

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return Response.json({ error: "Body JSON invalido" }, { status: 400 });
  }

  const parsed = dashboardFiltersSchema.safeParse(body);
  if (!parsed.success) {
    return Response.json(
      { error: "Filtros invalidos", issues: parsed.error.issues },
      { status: 400 }
    );
  }

  try {
    const t0 = performance.now();
    const table = await getEmissionsTable();
    const spec = buildDashboard(table, parsed.data);
    const latencyMs = Math.round(performance.now() - t0);
    console.log(`[dashboard] ${spec.rowCount} filas filtradas, ${spec.charts.length} charts (${latencyMs}ms)`);
    return Response.json(spec);
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : "Error desconocido";
    console.error("[dashboard] Error:", message);
    return Response.json({ error: message }, { status: 500 });
  }
}
