import { MatrixError } from './errors.js'

/**
 * Snapshot of a square grid, evaluated by Laplace expansion.
 *
 * Expansion always runs down the first column in increasing row order, so
 * the floating point summation order is the same on every call.
 * Cost is factorial in size. Nothing is cached.
 */
export class Determinant {
  readonly size: number
  private readonly items: readonly number[]

  constructor(items: readonly number[]) {
    const size = Math.sqrt(items.length)
    if (!Number.isInteger(size)) {
      throw new MatrixError('InappropriateNumberOfItems', `${items.length} items cannot form a square`)
    }
    this.size = size
    this.items = [...items]
  }

  value(): number {
    if (this.size === 0) return 0
    return this.evaluate(range(this.size), range(this.size))
  }

  /**
   * Determinant of the grid without row i and column j (1-based).
   */
  minor(i: number, j: number): number {
    this.checkPosition(i, j)
    const rows = range(this.size).filter(r => r !== i - 1)
    const cols = range(this.size).filter(c => c !== j - 1)
    // the empty minor of a 1x1 grid
    if (rows.length === 0) return 1
    return this.evaluate(rows, cols)
  }

  cofactor(i: number, j: number): number {
    return sign(i) * sign(j) * this.minor(i, j)
  }

  private checkPosition(i: number, j: number): void {
    if (!this.inRange(i) || !this.inRange(j)) {
      throw new MatrixError('IndexOutOfRange', `(${i}, ${j}) outside ${this.size}x${this.size}`)
    }
  }

  private inRange(index: number): boolean {
    return Number.isInteger(index) && index >= 1 && index <= this.size
  }

  private at(row: number, col: number): number {
    return this.items[row * this.size + col]
  }

  /**
   * Determinant of the sub-grid picked out by `rows` x `cols`.
   * Both lists are ascending and of equal length.
   */
  private evaluate(rows: number[], cols: number[]): number {
    const n = rows.length
    if (n === 1) return this.at(rows[0], cols[0])
    if (n === 2) {
      return this.at(rows[0], cols[0]) * this.at(rows[1], cols[1]) -
        this.at(rows[0], cols[1]) * this.at(rows[1], cols[0])
    }

    const rest = cols.slice(1)
    let value = 0
    for (let i = 0; i < n; i++) {
      const item = this.at(rows[i], cols[0])
      const minor = this.evaluate(rows.filter((_, k) => k !== i), rest)
      if (i % 2 === 0) {
        value += minor * item
      } else {
        value -= minor * item
      }
    }
    return value
  }
}

function sign(index: number): number {
  return index % 2 === 0 ? 1 : -1
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i)
}
