/**
 * Aligned multi-column text output
 *
 * Rows are collected first and rendered once all of them are known, since
 * a later row can widen any column.
 */

import { TableShapeError } from './errors.js';

type TableLine = { kind: 'text'; text: string } | { kind: 'row'; cells: string[] };

export class TablePrinter {
  private readonly entries: TableLine[] = [];
  private readonly widths: number[];

  constructor(readonly columns: number) {
    this.widths = new Array<number>(columns).fill(0);
  }

  /**
   * Add a line printed as-is, outside the column layout
   */
  insertText(text: string): void {
    this.entries.push({ kind: 'text', text });
  }

  insertRow(cells: readonly string[]): void {
    if (cells.length !== this.columns) {
      throw new TableShapeError(this.columns, cells.length);
    }
    cells.forEach((cell, i) => {
      this.widths[i] = Math.max(this.widths[i], cell.length);
    });
    this.entries.push({ kind: 'row', cells: [...cells] });
  }

  /**
   * Current width of every column
   */
  columnWidths(): number[] {
    return [...this.widths];
  }

  /**
   * Rendered lines, without line terminators. Every column but the last
   * is padded to its width and followed by one space.
   */
  lines(): string[] {
    return this.entries.map((entry) => {
      if (entry.kind === 'text') {
        return entry.text;
      }
      const last = this.columns - 1;
      return entry.cells
        .map((cell, i) => (i < last ? cell.padEnd(this.widths[i]) + ' ' : cell))
        .join('');
    });
  }

  render(): string {
    return this.lines()
      .map((line) => `${line}\n`)
      .join('');
  }
}
