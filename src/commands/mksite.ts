import ora from "ora";
import { loadContext, type AppContext } from "../context";
import { describeError } from "../errors";
import type { SiteProgress } from "../site";

function describeProgress(progress: SiteProgress): string {
  switch (progress.phase) {
    case "enumerate":
      return "Listing albums...";
    case "album":
      return `Rendering ${progress.album} (${progress.index + 1}/${progress.total})...`;
    case "index":
      return `Rendering index (${progress.total} albums)...`;
  }
}

export async function mksiteCommand(context?: AppContext): Promise<void> {
  const spinner = ora();

  try {
    const ctx = context ?? loadContext();
    spinner.start("Generating site...");
    const generator = ctx.createSiteGenerator((progress) => {
      spinner.text = describeProgress(progress);
    });
    const site = await generator.generate();
    spinner.succeed(`Generated ${site.albums.length} album page(s) and ${site.indexKey}`);

    spinner.start("Enabling website hosting...");
    const url = await ctx.publisher.publish();
    spinner.stop();

    console.log(url);
  } catch (error) {
    spinner.fail(`Site generation failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
