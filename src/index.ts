export { Matrix } from './matrix.js'
export { Determinant } from './determinant.js'
export { MatrixError, isMatrixError } from './errors.js'
export { formatMatrix } from './format.js'
export type { InverseOptions, MatrixErrorKind, MatrixGenerator, Order } from './types.js'
