/**
 * Fallo estructural de la fuente de datos: archivo inexistente, ilegible o
 * que no se puede interpretar como tabla. Es fatal, no hay resultado parcial.
 */
export class DataSourceError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = "DataSourceError";
    this.path = path;
  }
}
