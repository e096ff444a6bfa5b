/**
 * Which geodesic problem a solver was working on.
 */
export type GeodesicProblem = 'direct' | 'inverse';

/**
 * Error thrown when an iterative geodesic solution does not converge.
 *
 * Only plausible for nearly antipodal points. Never retried.
 */
export class NumericFailureError extends Error {
  readonly code = 'NUMERIC_FAILURE';
  readonly problem: GeodesicProblem;
  readonly iterations: number;

  constructor(problem: GeodesicProblem, iterations: number) {
    super(`Geodesic ${problem} solution failed to converge after ${iterations} iterations`);
    this.name = 'NumericFailureError';
    this.problem = problem;
    this.iterations = iterations;
    Object.setPrototypeOf(this, NumericFailureError.prototype);
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): { code: string; message: string; problem: GeodesicProblem; iterations: number } {
    return {
      code: this.code,
      message: this.message,
      problem: this.problem,
      iterations: this.iterations,
    };
  }
}
