import { cancel, intro, log, outro } from "@clack/prompts";

import type { BuildUi } from "../types";

export type ClackBuildUi = BuildUi & {
  intro(message: string): void;
  outro(message: string): void;
  cancelled(message: string): void;
};

export function createClackBuildUi(): ClackBuildUi {
  return {
    say(message) {
      log.step(message);
    },
    message(message) {
      log.message(message);
    },
    error(message) {
      log.error(message);
    },
    intro(message) {
      intro(message);
    },
    outro(message) {
      outro(message);
    },
    cancelled(message) {
      cancel(message);
    },
  };
}
