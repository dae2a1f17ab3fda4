import type { MatrixErrorKind } from './types.js'

const messages: Record<MatrixErrorKind, string> = {
  InappropriateNumberOfItems: 'Inappropriate number of items',
  TraceExistsOnlyForSquareMatrices: 'Traces exists only for square matrices',
  IncorrectOrdersForOperation: 'Incorrect orders of matrices for algebraic operations',
  IndexOutOfRange: 'Index out of range',
  SingularMatrix: 'Matrix is singular'
}

export class MatrixError extends Error {
  readonly kind: MatrixErrorKind

  constructor(kind: MatrixErrorKind, detail?: string) {
    super(detail ? `${messages[kind]}: ${detail}` : messages[kind])
    this.name = 'MatrixError'
    this.kind = kind
  }
}

export function isMatrixError(value: unknown, kind?: MatrixErrorKind): value is MatrixError {
  return value instanceof MatrixError && (kind === undefined || value.kind === kind)
}
