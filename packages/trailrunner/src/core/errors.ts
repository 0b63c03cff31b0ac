/**
 * Thrown when a mode identifier has no constructor in the mode table.
 *
 * Raised at start-up when a declared identifier is missing from the table,
 * and by `ModeFactory.createMode()` for identifiers that arrive at runtime
 * (for example from a command-line flag).
 */
export class UnregisteredModeError extends Error {
  public readonly modeId: string;

  constructor(modeId: string) {
    super(`No mode is registered for '${modeId}'`);
    this.name = "UnregisteredModeError";
    this.modeId = modeId;
  }
}

/**
 * Thrown when a state identifier has no constructor under its owning mode.
 */
export class UnregisteredStateError extends Error {
  public readonly stateId: string;
  public readonly ownerModeId: string;

  constructor(stateId: string, ownerModeId: string) {
    super(`No state '${stateId}' is registered for mode '${ownerModeId}'`);
    this.name = "UnregisteredStateError";
    this.stateId = stateId;
    this.ownerModeId = ownerModeId;
  }
}

/**
 * Thrown when the runtime is driven in a way its structure forbids, such as
 * sweeping flagged modes while the stack is empty or ticking a destroyed
 * simulation. Callers should treat it as a bug, not retry.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
  }
}
