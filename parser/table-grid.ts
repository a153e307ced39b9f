/**
 * Table grid pass: zero-based row/column indices for every cell, the number
 * of visible cells per row and the column count of the table. Cells covered
 * by a row span from an earlier row shift later cells to the right.
 */

import { DocKind, type HtmlCellNode, type HtmlRowNode, type HtmlTableNode } from './ast-types.js';
import { getAttribute } from './parser-utils.js';

interface ActiveRowSpan {
  rowsLeft: number;
  column: number;
}

export function rowSpanOf(cell: HtmlCellNode): number {
  const value = parseInt(getAttribute(cell.attribs, 'rowspan') ?? '', 10);
  return Number.isNaN(value) || value < 0 ? 0 : value;
}

export function colSpanOf(cell: HtmlCellNode): number {
  const value = parseInt(getAttribute(cell.attribs, 'colspan') ?? '', 10);
  return Number.isNaN(value) || value < 1 ? 1 : value;
}

export function computeTableGrid(table: HtmlTableNode): void {
  const rowSpans: ActiveRowSpan[] = [];
  let maxColumns = 0;
  let rowIndex = 0;

  for (const row of table.children) {
    if (row.kind !== DocKind.HtmlRow) continue;
    let columnIndex = 0;
    let cells = 0;

    for (const cell of row.children) {
      if (cell.kind !== DocKind.HtmlCell) continue;
      for (const span of rowSpans) {
        if (span.rowsLeft > 0 && span.column === columnIndex) {
          columnIndex = span.column + 1;
          cells++;
        }
      }
      const rowSpan = rowSpanOf(cell);
      if (rowSpan > 0) rowSpans.push({ rowsLeft: rowSpan, column: columnIndex });
      cell.rowIndex = rowIndex;
      cell.columnIndex = columnIndex;
      columnIndex += colSpanOf(cell);
      cells++;
    }

    for (const span of rowSpans) {
      if (span.rowsLeft > 0) span.rowsLeft--;
    }
    row.visibleCells = cells;
    row.rowIndex = rowIndex;
    rowIndex++;
    if (columnIndex > maxColumns) maxColumns = columnIndex;
  }

  table.numColumns = maxColumns;
}

/**
 * Run the grid pass once; later calls reuse the cached result
 */
export function ensureTableGrid(table: HtmlTableNode): HtmlTableNode {
  if (table.numColumns < 0) computeTableGrid(table);
  return table;
}

/**
 * A row is a heading row when its first cell is a heading cell
 */
export function isHeadingRow(row: HtmlRowNode): boolean {
  const first = row.children[0];
  return first?.kind === DocKind.HtmlCell && first.isHeading;
}
