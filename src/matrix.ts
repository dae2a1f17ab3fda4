import { Determinant } from './determinant.js'
import { MatrixError } from './errors.js'
import { formatMatrix } from './format.js'
import type { InverseOptions, MatrixGenerator, Order } from './types.js'

/**
 * Dense matrix stored row by row. Positions are 1-based: (i, j) is row i,
 * column j.
 */
export class Matrix {
  private items: number[]
  private shape: Order

  constructor(items: readonly number[], order: Order) {
    const [rows, cols] = order
    if (!isCount(rows) || !isCount(cols) || items.length !== rows * cols) {
      throw new MatrixError('InappropriateNumberOfItems', `${items.length} items for order ${rows}x${cols}`)
    }
    this.items = [...items]
    this.shape = [rows, cols]
  }

  /**
   * Builds a matrix by calling `f` for every position, row by row.
   */
  static generate(f: MatrixGenerator, order: Order): Matrix {
    const items: number[] = []
    for (let i = 1; i <= order[0]; i++) {
      for (let j = 1; j <= order[1]; j++) {
        items.push(f(i, j))
      }
    }
    return new Matrix(items, order)
  }

  static fromRows(rows: readonly (readonly number[])[]): Matrix {
    const cols = rows[0]?.length ?? 0
    if (rows.some(row => row.length !== cols)) {
      throw new MatrixError('InappropriateNumberOfItems', 'rows differ in length')
    }
    return new Matrix(rows.flat(), [rows.length, cols])
  }

  static rowMatrix(items: readonly number[]): Matrix {
    return new Matrix(items, [1, items.length])
  }

  static columnMatrix(items: readonly number[]): Matrix {
    return new Matrix(items, [items.length, 1])
  }

  static nullMatrix(order: Order): Matrix {
    return Matrix.generate(() => 0, order)
  }

  static squareMatrix(items: readonly number[]): Matrix {
    const size = Math.sqrt(items.length)
    if (!Number.isInteger(size)) {
      throw new MatrixError('InappropriateNumberOfItems', `${items.length} items cannot form a square`)
    }
    return new Matrix(items, [size, size])
  }

  static diagonalMatrix(items: readonly number[]): Matrix {
    return Matrix.generate((i, j) => (i === j ? items[i - 1] : 0), [items.length, items.length])
  }

  static scalarMatrix(value: number, size: number): Matrix {
    return Matrix.generate((i, j) => (i === j ? value : 0), [size, size])
  }

  static identityMatrix(size: number): Matrix {
    return Matrix.scalarMatrix(1, size)
  }

  get order(): Order {
    return this.shape
  }

  get rows(): number {
    return this.shape[0]
  }

  get cols(): number {
    return this.shape[1]
  }

  isSquare(): boolean {
    return this.rows === this.cols
  }

  isHorizontal(): boolean {
    return this.cols > this.rows
  }

  isVertical(): boolean {
    return this.rows > this.cols
  }

  get(i: number, j: number): number {
    return this.items[this.indexOf(i, j)]
  }

  set(i: number, j: number, value: number): void {
    this.items[this.indexOf(i, j)] = value
  }

  getRow(i: number): number[] {
    if (!inBounds(i, this.rows)) {
      throw new MatrixError('IndexOutOfRange', `row ${i} of ${this.rows}`)
    }
    const start = (i - 1) * this.cols
    return this.items.slice(start, start + this.cols)
  }

  getColumn(j: number): number[] {
    if (!inBounds(j, this.cols)) {
      throw new MatrixError('IndexOutOfRange', `column ${j} of ${this.cols}`)
    }
    return this.items.filter((_, idx) => idx % this.cols === j - 1)
  }

  toArray(): number[] {
    return [...this.items]
  }

  toRows(): number[][] {
    return Array.from({ length: this.rows }, (_, r) => this.getRow(r + 1))
  }

  /**
   * Entries on the main diagonal, top-left to bottom-right.
   */
  trace(): number[] {
    if (!this.isSquare()) {
      throw new MatrixError('TraceExistsOnlyForSquareMatrices')
    }
    return Array.from({ length: this.rows }, (_, k) => this.get(k + 1, k + 1))
  }

  transpose(): Matrix {
    return Matrix.generate((i, j) => this.get(j, i), [this.cols, this.rows])
  }

  toDeterminant(): Determinant {
    if (!this.isSquare()) {
      throw new MatrixError('IncorrectOrdersForOperation', `determinant of ${this.rows}x${this.cols}`)
    }
    return new Determinant(this.items)
  }

  determinant(): number {
    return this.toDeterminant().value()
  }

  /**
   * Transpose of the cofactor matrix.
   */
  adjoint(): Matrix {
    const det = this.toDeterminant()
    return Matrix.generate((i, j) => det.cofactor(i, j), this.shape).transpose()
  }

  /**
   * Adjugate divided by the determinant. Throws `SingularMatrix` when
   * |det| <= `singularTolerance` (default 0).
   */
  inverse(opts?: InverseOptions): Matrix {
    const tolerance = opts?.singularTolerance ?? 0
    const det = this.determinant()
    if (Math.abs(det) <= tolerance) {
      throw new MatrixError('SingularMatrix', `determinant is ${det}`)
    }
    return this.adjoint().divide(det)
  }

  round(): Matrix {
    return this.map(roundHalfAwayFromZero)
  }

  roundMut(): void {
    this.items = this.items.map(roundHalfAwayFromZero)
  }

  add(other: Matrix): Matrix {
    this.checkSameOrder(other)
    return Matrix.generate((i, j) => this.get(i, j) + other.get(i, j), this.shape)
  }

  subtract(other: Matrix): Matrix {
    this.checkSameOrder(other)
    return Matrix.generate((i, j) => this.get(i, j) - other.get(i, j), this.shape)
  }

  multiply(other: Matrix): Matrix {
    if (this.cols !== other.rows) {
      throw new MatrixError('IncorrectOrdersForOperation', `${this.rows}x${this.cols} times ${other.rows}x${other.cols}`)
    }
    return Matrix.generate((i, j) => {
      const a = this.getRow(i)
      const b = other.getColumn(j)
      let sum = 0
      for (let k = 0; k < a.length; k++) {
        sum += a[k] * b[k]
      }
      return sum
    }, [this.rows, other.cols])
  }

  scale(s: number): Matrix {
    return this.map(x => x * s)
  }

  divide(s: number): Matrix {
    return this.map(x => x / s)
  }

  addMut(other: Matrix): void {
    this.assign(this.add(other))
  }

  subtractMut(other: Matrix): void {
    this.assign(this.subtract(other))
  }

  multiplyMut(other: Matrix): void {
    this.assign(this.multiply(other))
  }

  scaleMut(s: number): void {
    this.assign(this.scale(s))
  }

  divideMut(s: number): void {
    this.assign(this.divide(s))
  }

  equals(other: Matrix): boolean {
    return this.rows === other.rows &&
      this.cols === other.cols &&
      this.items.every((x, idx) => x === other.items[idx])
  }

  clone(): Matrix {
    return new Matrix(this.items, this.shape)
  }

  toString(): string {
    return formatMatrix(this.items, this.cols)
  }

  print(): void {
    console.log(this.toString())
  }

  private map(f: (x: number) => number): Matrix {
    return new Matrix(this.items.map(f), this.shape)
  }

  private assign(source: Matrix): void {
    this.items = source.items
    this.shape = source.shape
  }

  private indexOf(i: number, j: number): number {
    if (!inBounds(i, this.rows) || !inBounds(j, this.cols)) {
      throw new MatrixError('IndexOutOfRange', `(${i}, ${j}) outside ${this.rows}x${this.cols}`)
    }
    return (i - 1) * this.cols + (j - 1)
  }

  private checkSameOrder(other: Matrix): void {
    if (this.rows !== other.rows || this.cols !== other.cols) {
      throw new MatrixError('IncorrectOrdersForOperation', `${this.rows}x${this.cols} and ${other.rows}x${other.cols}`)
    }
  }
}

function isCount(n: number): boolean {
  return Number.isInteger(n) && n >= 0
}

function inBounds(index: number, size: number): boolean {
  return Number.isInteger(index) && index >= 1 && index <= size
}

function roundHalfAwayFromZero(x: number): number {
  return Math.sign(x) * Math.round(Math.abs(x))
}
