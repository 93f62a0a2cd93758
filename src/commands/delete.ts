import ora from "ora";
import { createInterface } from "readline";
import { loadContext, type AppContext } from "../context";
import { PartialDeleteFailureError, describeError } from "../errors";

export interface DeleteOptions {
  yes?: boolean;
}

/** Resolves false when input ends before an answer arrives. */
export async function confirm(
  message: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<boolean> {
  const rl = createInterface({ input, output });

  return new Promise((resolve) => {
    rl.on("close", () => resolve(false));
    rl.question(`${message} (y/N): `, (answer) => {
      resolve(answer.toLowerCase() === "y");
      rl.close();
    });
  });
}

export async function deleteCommand(
  album: string,
  options: DeleteOptions = {},
  context?: AppContext
): Promise<void> {
  const spinner = ora();

  if (!options.yes) {
    const confirmed = await confirm(`Delete album "${album}" and all of its photos?`);
    if (!confirmed) {
      console.log("Cancelled.");
      return;
    }
  }

  try {
    const ctx = context ?? loadContext();
    spinner.start(`Deleting ${album}...`);
    const result = await ctx.repository.deleteAlbum(album);
    spinner.stop();

    if (result.status === "not_found") {
      console.log(`Album "${album}" not found`);
    } else {
      console.log(`Album "${album}" deleted (${result.deleted} objects)`);
    }
  } catch (error) {
    spinner.stop();
    if (error instanceof PartialDeleteFailureError) {
      console.error(error.message);
      for (const key of error.failed) {
        console.error(`  ✗ ${key}`);
      }
    } else {
      console.error(`Failed to delete album: ${describeError(error)}`);
    }
    process.exitCode = 1;
  }
}
