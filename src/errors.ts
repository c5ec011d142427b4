/**
 * Thrown when a reference day passed to the engine is not a valid
 * `YYYY-MM-DD` calendar day.
 *
 * This is a contract violation by the caller: day strings must be
 * validated before they reach the engine. Infeasible plans never throw;
 * they surface as remaining minutes, slack records and trace entries.
 *
 * @category Errors
 */
export class InvalidDayError extends Error {
  public readonly value: unknown;

  constructor(value: unknown) {
    super(`Invalid day string: ${JSON.stringify(value)} (expected YYYY-MM-DD)`);
    this.name = "InvalidDayError";
    this.value = value;
  }
}
