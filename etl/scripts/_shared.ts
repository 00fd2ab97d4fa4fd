// ------------------------------------------------------------
// CLI args
// ------------------------------------------------------------

export type CliArgs = Map<string, string | boolean>;

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = new Map();
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) continue;
    const key = a.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      args.set(key, true);
    } else {
      args.set(key, next);
      i++;
    }
  }
  return args;
}

/** Valor string de un flag; `--flag` sin valor cuenta como ausente. */
export function stringArg(args: CliArgs, key: string): string | undefined {
  const value = args.get(key);
  return typeof value === "string" ? value : undefined;
}

export function intArg(args: CliArgs, key: string, fallback: number): number {
  const raw = stringArg(args, key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`--${key} debe ser un entero positivo (recibido: ${raw})`);
  }
  return n;
}
