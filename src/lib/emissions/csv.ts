import { parse } from "csv-parse";
import { stringify } from "csv-stringify/sync";
import { closeSync, createReadStream, existsSync, mkdirSync, openSync, readSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { DataSourceError } from "./errors";
import type { RawRecord, RawTable } from "@/lib/types";

export function ensureDir(path: string) {
  if (!existsSync(path)) mkdirSync(path, { recursive: true });
}

export function normalizeColumnName(name: string): string {
  return name
    .toLowerCase()
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[^a-z0-9_]/g, "");
}

export function detectDelimiter(filePath: string): string {
  // Solo el primer chunk: alcanza para ver el header.
  const fd = openSync(filePath, "r");
  let firstLine = "";
  try {
    const buf = Buffer.alloc(64 * 1024);
    const bytes = readSync(fd, buf, 0, buf.length, 0);
    const snippet = buf.subarray(0, bytes).toString("utf8");
    firstLine = snippet.split(/\r?\n/)[0] ?? "";
  } finally {
    closeSync(fd);
  }

  if (firstLine.includes("\t")) return "\t";
  if (firstLine.includes(";")) return ";";
  return ",";
}

function parseWithEncoding(path: string, delimiter: string, encoding: BufferEncoding) {
  return new Promise<RawTable>((resolve, reject) => {
    let columns: string[] | null = null;
    const rows: RawRecord[] = [];

    const parser = parse({
      delimiter,
      columns: (headers: string[]) => {
        columns = headers.map(normalizeColumnName);
        return columns;
      },
      skip_empty_lines: true,
      relax_column_count_less: true,
      trim: true,
      bom: true,
    });

    createReadStream(path, { encoding })
      .on("error", reject)
      .pipe(parser);

    parser.on("data", (row: RawRecord) => {
      rows.push(row);
    });
    parser.on("end", () => {
      if (!columns) {
        reject(new Error("sin fila de encabezado"));
        return;
      }
      resolve({ columns, rows });
    });
    parser.on("error", reject);
  });
}

/**
 * Lee un archivo delimitado a registros indexados por columna normalizada.
 * Si el parse falla en utf8 se reintenta una vez con latin1.
 */
export async function readDelimited(
  path: string,
  logger: Pick<Console, "warn"> = console
): Promise<RawTable> {
  if (!existsSync(path)) {
    throw new DataSourceError(path, "Archivo no encontrado");
  }

  let delimiter: string;
  try {
    delimiter = detectDelimiter(path);
  } catch (err) {
    throw new DataSourceError(path, "No se pudo leer el archivo", { cause: err });
  }

  try {
    return await parseWithEncoding(path, delimiter, "utf8");
  } catch (err) {
    logger.warn(`  Parse fallo con utf8 (${String(err)}). Reintentando con latin1...`);
    try {
      return await parseWithEncoding(path, delimiter, "latin1");
    } catch (retryErr) {
      throw new DataSourceError(path, "No se pudo interpretar como tabla", { cause: retryErr });
    }
  }
}

export type CsvCell = string | number | null;

export async function writeDelimited(
  path: string,
  columns: string[],
  records: Record<string, CsvCell>[]
): Promise<void> {
  ensureDir(dirname(path));
  const csv = stringify(records, { header: true, columns });
  await writeFile(path, csv, "utf8");
}
