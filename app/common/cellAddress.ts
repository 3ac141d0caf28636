/**
 * Converts a 1-based column number to its letters, e.g. 1 -> "A", 27 -> "AA".
 */
export function getColumnLetters(col: number): string {
  let columnName = "";
  let tempCol = col - 1;

  while (tempCol >= 0) {
    columnName = String.fromCharCode(65 + (tempCol % 26)) + columnName;
    tempCol = Math.floor(tempCol / 26) - 1;
  }
  return columnName;
}

/**
 * Converts a 1-based (row, col) pair to an A1-style reference, e.g. (2, 3) -> "C2".
 */
export function getCellAddress(row: number, col: number): string {
  return `${getColumnLetters(col)}${row}`;
}
