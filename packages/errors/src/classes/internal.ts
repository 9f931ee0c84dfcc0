import { SwitchyardError } from "../base.js";
import type { SwitchyardErrorOptions } from "../types.js";

/**
 * Unexpected failure inside Switchyard itself (a bug, not a provider outcome).
 */
export class InternalError extends SwitchyardError {
  declare readonly code: "INTERNAL_ERROR";

  constructor(message: string, options?: SwitchyardErrorOptions) {
    super("INTERNAL_ERROR", message, options);
  }
}
