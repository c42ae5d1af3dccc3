import type { IHaveDebugStr } from '../debug.js';

/**
 * A grid of printable cells, used for debug renderings of automata.
 */
export class Table implements IHaveDebugStr {
  private rows: string[][] = [];
  private _numCols: number = 0;

  get numRows() {
    return this.rows.length;
  }
  get numCols() {
    return this._numCols;
  }

  /**
   * Append a row. Missing trailing cells are left blank.
   */
  addRow(cells: string[]) {
    this._numCols = Math.max(this._numCols, cells.length);
    this.rows.push([...cells]);
  }

  getCell(row: number, col: number): string {
    if (row < 0 || row >= this.rows.length) {
      throw new Error(
        `TableIndexError: Invalid row ${row}. Must be between 0 and ${
          this.rows.length - 1
        } inclusive`
      );
    }
    return this.rows[row][col] ?? '';
  }

  /**
   * return a debug string for the table, with every column right
   * aligned to its widest cell.
   */
  toDebugStr() {
    let out = '';
    const minWidths: number[] = [];
    for (let ci = 0; ci < this.numCols; ci++) {
      let minWidth = 1;
      for (let ri = 0; ri < this.numRows; ri++) {
        minWidth = Math.max(minWidth, this.getCell(ri, ci).length);
      }
      minWidths.push(minWidth);
    }

    for (let row = 0; row < this.numRows; row++) {
      for (let col = 0; col < this.numCols; col++) {
        out += this.getCell(row, col).padStart(minWidths[col] + 2);
      }
      out += '\n';
    }
    return out;
  }
}
