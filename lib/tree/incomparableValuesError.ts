/**
 * Incomparable values error definitions.
 *
 * Raised when an ordering cannot relate two values, for example `NaN`
 * against any number under the natural order.
 *
 * @module
 */
export class IncomparableValuesError extends Error {
  constructor(
    public readonly item: unknown,
    public readonly value: unknown,
  ) {
    super(`cannot order ${String(item)} relative to ${String(value)}`);
    this.name = "IncomparableValuesError";
  }
}
