/**
 * Thrown when the simulation reaches a state a correct implementation never produces
 * (negative bounce budget, a transition missing from the state table, ...).
 * Not meant to be caught and recovered from.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) throw new InvariantError(message);
}
