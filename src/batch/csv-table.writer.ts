import * as fs from 'fs/promises';

export type CsvCell = string | number | null;

const ROW_TERMINATOR = '\r\n';
const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvCell(cell: CsvCell): string {
  if (cell === null) {
    return '';
  }
  const text = String(cell);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow(cells: readonly CsvCell[]): string {
  return cells.map(formatCsvCell).join(',') + ROW_TERMINATOR;
}

/**
 * Append-only CSV file. The handle stays open until `close()`, which callers
 * are expected to reach from a `finally` block.
 */
export class CsvTableWriter {
  private rowCount = 0;
  private closed = false;

  private constructor(
    private readonly handle: fs.FileHandle,
    readonly filePath: string,
  ) {}

  static async open(
    filePath: string,
    header: readonly string[],
  ): Promise<CsvTableWriter> {
    const handle = await fs.open(filePath, 'w');
    const writer = new CsvTableWriter(handle, filePath);
    try {
      await handle.write(formatCsvRow(header), null, 'utf8');
    } catch (err) {
      await writer.close();
      throw err;
    }
    return writer;
  }

  /** Data rows written so far, header excluded. */
  get rows(): number {
    return this.rowCount;
  }

  async writeRow(cells: readonly CsvCell[]): Promise<void> {
    if (this.closed) {
      throw new Error(`CSV writer for ${this.filePath} is already closed`);
    }
    await this.handle.write(formatCsvRow(cells), null, 'utf8');
    this.rowCount++;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }
}
