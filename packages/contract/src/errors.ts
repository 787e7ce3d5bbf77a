/** Error thrown when a comparator definition violates the comparison contract. */
export class ApproxContractError extends Error {
  override name = "ApproxContractError";

  constructor(message: string) {
    super(message);
  }
}
