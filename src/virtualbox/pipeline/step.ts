import type { BuildContext } from "./context";

export type StepResult = { action: "continue" } | { action: "halt"; error: unknown };

/**
 * One provisioning operation. `cleanup` runs for every step whose `run` was
 * entered, in reverse order, however the build ends.
 */
export interface Step {
  readonly id: string;
  readonly description: string;
  run(context: BuildContext): Promise<StepResult>;
  cleanup?(context: BuildContext): Promise<void>;
}

export const CONTINUE: StepResult = { action: "continue" };

export function halt(error: unknown): StepResult {
  return { action: "halt", error };
}
