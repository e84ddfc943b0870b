import { CliHelpRequested, CliUsageError } from "../shared/cli-errors";
import { createLogger } from "../shared/log";
import { renderCliError } from "../shared/render-cli-error";
import { VirtualBoxBuilder } from "../virtualbox/builder";
import { parseVboxBuildArgs } from "../virtualbox/cli/args";
import { vboxBuildUsage } from "../virtualbox/cli/usage";
import { loadTemplate } from "../virtualbox/config/template";
import { FileDownloadCache } from "../virtualbox/download/cache";
import type { PostStepHook } from "../virtualbox/types";
import { createClackBuildUi } from "../virtualbox/ui/clack-ui";
import { getCacheRoot } from "../virtualbox/utils/fs";

const log = createLogger({ component: "cli" });

export const EXIT_CANCELLED = 130;

const CANCEL_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export async function runVboxBuild(argv: string[]): Promise<number> {
  let builder: VirtualBoxBuilder | null = null;
  const onSignal = (signal: NodeJS.Signals): void => {
    log.info("received signal, cancelling build", { signal });
    builder?.cancel();
  };

  for (const signal of CANCEL_SIGNALS) {
    process.on(signal, onSignal);
  }

  try {
    const options = parseVboxBuildArgs(argv);
    const template = loadTemplate(options.templatePath);

    builder = new VirtualBoxBuilder({
      vboxManagePath: options.vboxManagePath,
      baseDir: template.baseDir,
      force: options.force,
    });
    const config = await builder.prepare(template.raw);

    if (options.dryRun) {
      console.log(JSON.stringify(builder.plan(), null, 2));
      return 0;
    }

    const ui = createClackBuildUi();
    const cache = new FileDownloadCache(options.cacheDir ?? getCacheRoot());
    const hook: PostStepHook = async (event) => {
      log.debug("step completed", { step: event.step, index: event.index, total: event.total });
    };

    ui.intro(`vbox-build: ${config.vmName}`);
    const artifact = await builder.run(ui, hook, cache);

    if (!artifact) {
      ui.cancelled("Build cancelled; cleanup finished.");
      return EXIT_CANCELLED;
    }

    ui.outro(`Build finished: ${artifact.toString()}`);
    console.log(JSON.stringify(artifact, null, 2));
    return 0;
  } catch (error) {
    if (error instanceof CliHelpRequested) {
      console.log(vboxBuildUsage());
      return 0;
    }

    console.error(renderCliError(error));

    if (error instanceof CliUsageError) {
      console.error("\n" + vboxBuildUsage());
    }

    return 1;
  } finally {
    for (const signal of CANCEL_SIGNALS) {
      process.off(signal, onSignal);
    }
  }
}
