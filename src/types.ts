/**
 * Shape of a matrix as [rows, cols].
 */
export type Order = readonly [rows: number, cols: number]

/**
 * Produces the entry at 1-based (i, j).
 */
export type MatrixGenerator = (i: number, j: number) => number

export type MatrixErrorKind =
  | 'InappropriateNumberOfItems'
  | 'TraceExistsOnlyForSquareMatrices'
  | 'IncorrectOrdersForOperation'
  | 'IndexOutOfRange'
  | 'SingularMatrix'

export interface InverseOptions {
  // |det| at or below this is treated as singular. Negative disables the check.
  singularTolerance?: number
}
