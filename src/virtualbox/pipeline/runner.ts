import { BuildCancelledError, StepFailureError, isBuildCancelled } from "../../shared/cli-errors";
import { createLogger } from "../../shared/log";
import type { BuildContext } from "./context";
import type { Step, StepResult } from "./step";

const log = createLogger({ component: "step-runner" });

export type RunOutcome =
  | { status: "completed" }
  | { status: "failed"; error: StepFailureError }
  | { status: "cancelled" };

/**
 * Runs steps one at a time against a shared context. Cancellation is checked
 * between steps; a step that is already running is expected to watch
 * `signal` itself. A runner is good for one run.
 */
export class StepRunner {
  private readonly controller = new AbortController();
  private started = false;

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(): void {
    if (this.controller.signal.aborted) {
      return;
    }

    log.info("cancelling step runner");
    this.controller.abort(new BuildCancelledError());
  }

  async run(steps: readonly Step[], context: BuildContext): Promise<RunOutcome> {
    if (this.started) {
      throw new Error("StepRunner instances cannot be reused.");
    }
    this.started = true;

    const executed: Step[] = [];
    let outcome: RunOutcome = { status: "completed" };

    for (const [index, step] of steps.entries()) {
      if (this.signal.aborted) {
        outcome = { status: "cancelled" };
        break;
      }

      executed.push(step);
      log.debug("running step", { step: step.id, index });

      const result = await runStep(step, context);
      if (result.action === "halt") {
        outcome = this.haltOutcome(step, result.error);
        break;
      }

      try {
        await context.hook({ step: step.id, index, total: steps.length });
      } catch (error) {
        outcome = this.haltOutcome(step, error);
        break;
      }
    }

    context.state = outcome.status === "failed" ? "halted" : outcome.status;
    log.debug("step run finished", { status: outcome.status, executed: executed.map((step) => step.id) });

    await unwind(executed, context);
    return outcome;
  }

  private haltOutcome(step: Step, error: unknown): RunOutcome {
    if (isBuildCancelled(error, this.signal)) {
      return { status: "cancelled" };
    }

    return { status: "failed", error: new StepFailureError(step.id, error) };
  }
}

async function runStep(step: Step, context: BuildContext): Promise<StepResult> {
  try {
    return await step.run(context);
  } catch (error) {
    return { action: "halt", error };
  }
}

async function unwind(executed: Step[], context: BuildContext): Promise<void> {
  for (const step of [...executed].reverse()) {
    if (!step.cleanup) {
      continue;
    }

    try {
      await step.cleanup(context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error("step cleanup failed", { step: step.id, error: message });
      context.ui.error(`Cleanup of step '${step.id}' failed: ${message}`);
    }
  }
}
