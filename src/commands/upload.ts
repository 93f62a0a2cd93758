import ora from "ora";
import { resolve } from "path";
import { loadContext, type AppContext } from "../context";
import { PathNotFoundError, describeError } from "../errors";

export interface UploadOptions {
  album: string;
  path: string;
}

export async function uploadCommand(options: UploadOptions, context?: AppContext): Promise<void> {
  const spinner = ora();
  const sourceDir = resolve(options.path);

  try {
    const ctx = context ?? loadContext();
    spinner.start(`Uploading to ${options.album}...`);
    let count = 0;
    await ctx.repository.uploadAlbum(options.album, sourceDir, (key) => {
      count++;
      spinner.text = `Uploaded ${count}: ${key}`;
    });
    spinner.stop();
  } catch (error) {
    spinner.stop();
    if (error instanceof PathNotFoundError) {
      console.log(`Path not found: ${options.path}`);
      return;
    }
    console.error(`Upload failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
