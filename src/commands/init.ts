import { writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import ora from "ora";
import { getDefaultConfig, getGlobalConfigDir } from "../config";

export interface InitOptions {
  local?: boolean;
}

/**
 * Writes a config template. Storage settings still have to be filled in.
 */
export async function initCommand(options: InitOptions = {}): Promise<void> {
  const spinner = ora();

  let configPath: string;
  if (options.local) {
    configPath = join(process.cwd(), "config.yaml");
  } else {
    const globalDir = getGlobalConfigDir();
    if (!existsSync(globalDir)) {
      mkdirSync(globalDir, { recursive: true });
    }
    configPath = join(globalDir, "config.yaml");
  }

  if (existsSync(configPath)) {
    spinner.info(`Config file already exists: ${configPath}`);
    return;
  }

  writeFileSync(configPath, getDefaultConfig());
  spinner.succeed(`Created config file: ${configPath}`);

  console.log("\nNext steps:");
  console.log("1. Set storage.bucket and credentials in the config file");
  console.log("2. Run: cloudalbum upload --album <name> --path <dir>");
  console.log("3. Run: cloudalbum mksite");
}
