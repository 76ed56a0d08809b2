/**
 * Load failures. Any of these is fatal to a session: callers stop and
 * report instead of working with a partial table.
 */

export class LoadError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LoadError";
    this.path = path;
  }
}

export class FileNotFoundError extends LoadError {
  constructor(path: string, options?: { cause?: unknown }) {
    super(path, `Statistics file not found: ${path}`, options);
    this.name = "FileNotFoundError";
  }
}

export interface ParseErrorLocation {
  /** 1-based data row, header excluded. */
  row?: number;
  column?: string;
}

export class ParseError extends LoadError {
  readonly row?: number;
  readonly column?: string;

  constructor(path: string, detail: string, location: ParseErrorLocation = {}) {
    super(path, `Could not parse ${path}: ${describeLocation(location)}${detail}`);
    this.name = "ParseError";
    this.row = location.row;
    this.column = location.column;
  }
}

function describeLocation({ row, column }: ParseErrorLocation): string {
  if (row !== undefined && column !== undefined) return `row ${row}, column ${column}: `;
  if (row !== undefined) return `row ${row}: `;
  if (column !== undefined) return `column ${column}: `;
  return "";
}
