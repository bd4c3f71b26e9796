import { ConfigError, InvariantViolation, NotFoundError, PersistenceError, errorMessage } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";

/** Message shown for a failure escaping a command */
export function describeCommandError(err: unknown): string {
  if (err instanceof PersistenceError) {
    return `Scheduling temporarily unavailable: ${err.message}`;
  }
  if (err instanceof NotFoundError || err instanceof ConfigError) {
    return err.message;
  }
  if (err instanceof InvariantViolation) {
    return `Not allowed: ${err.message}`;
  }
  return `Unexpected error: ${errorMessage(err)}`;
}

/**
 * Run a command body, reporting any failure through the runtime and
 * exiting non-zero instead of letting the rejection reach commander.
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    runtime.error(describeCommandError(err));
    runtime.exit(1);
  }
}
