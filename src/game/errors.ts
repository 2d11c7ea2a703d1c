/**
 * Raised when a collaborator hands the core malformed input (an entity with a
 * non-finite position, a negative radius, an inverted obstacle box, an invalid
 * config). Never raised for conditions that occur during normal play.
 */
export class SimulationInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SimulationInputError";
  }
}
