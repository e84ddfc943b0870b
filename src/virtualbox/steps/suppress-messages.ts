import { CONTINUE, type Step } from "../pipeline/step";

export function createSuppressMessagesStep(): Step {
  return {
    id: "suppress-messages",
    description: "Silence VirtualBox GUI prompts that would block an unattended build.",

    async run(context) {
      context.ui.say("Suppressing annoying messages from VirtualBox...");
      await context.driver.suppressMessages(context.signal);
      return CONTINUE;
    },
  };
}
