import { getWorldRegions } from "@/lib/data/world-regions";

export function GET() {
  try {
    const features = getWorldRegions();
    return Response.json(
      { features },
      { headers: { "Cache-Control": "public, max-age=86400" } }
    );
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : "Error desconocido";
    console.error("[geo] No se pudo cargar world-atlas:", message);
    return Response.json({ error: message }, { status: 500 });
  }
}
