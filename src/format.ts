/**
 * Renders row-major items as a left-aligned grid. Every cell is padded to the
 * widest item and followed by two spaces; each row ends with a newline.
 */
export function formatMatrix(items: readonly number[], cols: number): string {
  const cells = items.map(item => String(item))
  const width = cells.reduce((max, cell) => Math.max(max, cell.length), 0)

  let out = ''
  for (let i = 0; i < cells.length; i++) {
    out += cells[i].padEnd(width) + '  '
    if ((i + 1) % cols === 0) out += '\n'
  }
  return out
}
