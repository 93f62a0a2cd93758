import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { existsSync, readFileSync } from "fs";
import { homedir, tmpdir } from "os";
import { join, resolve } from "path";
import { ConfigError } from "./errors";

const configSchema = z.object({
  storage: z.object({
    bucket: z.string().min(1, "storage.bucket is required"),
    endpoint: z.string().url().default("https://storage.yandexcloud.net"),
    region: z.string().default("ru-central1"),
    accessKeyId: z.string().optional(),
    secretAccessKey: z.string().optional(),
    forcePathStyle: z.boolean().default(false),
  }),
  website: z
    .object({
      domain: z.string().min(1).default("website.yandexcloud.net"),
    })
    .default({}),
  albums: z
    .object({
      extensions: z.array(z.string().startsWith(".")).min(1).default([".jpg", ".jpeg"]),
    })
    .default({}),
  staging: z
    .object({
      path: z.string().default(join(tmpdir(), "cloudalbum-site")),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

const CONFIG_FILENAME = "config.yaml";
const GLOBAL_CONFIG_DIR = join(homedir(), ".config", "cloudalbum");

function expandPath(p: string): string {
  if (p.startsWith("~/")) {
    return join(homedir(), p.slice(2));
  }
  return resolve(p);
}

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}

export function getConfigPath(): string {
  const localPath = join(process.cwd(), CONFIG_FILENAME);
  if (existsSync(localPath)) {
    return localPath;
  }
  return join(GLOBAL_CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Validate raw (already parsed) configuration and normalise paths.
 */
export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  const config = result.data;
  const { accessKeyId, secretAccessKey } = config.storage;
  if (Boolean(accessKeyId) !== Boolean(secretAccessKey)) {
    throw new ConfigError(
      "Invalid configuration:\n  storage: accessKeyId and secretAccessKey must be set together"
    );
  }

  config.staging.path = expandPath(config.staging.path);
  config.albums.extensions = config.albums.extensions.map((e) => e.toLowerCase());
  return config;
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath} (run 'cloudalbum init')`);
  }

  const content = readFileSync(configPath, "utf-8");
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}`, { cause: error });
  }
  return parseConfig(raw);
}

export function getDefaultConfig(): string {
  return `# cloudalbum Configuration

storage:
  bucket: ""                                  # Bucket holding albums and the generated site
  endpoint: https://storage.yandexcloud.net   # Any S3-compatible endpoint
  region: ru-central1
  accessKeyId: ""                             # Leave both keys empty to use the AWS default credential chain
  secretAccessKey: ""
  forcePathStyle: false                       # true for MinIO and similar servers

website:
  domain: website.yandexcloud.net   # Site URL is https://<bucket>.<domain>/

albums:
  extensions:                       # Photo extensions (case-insensitive)
    - ".jpg"
    - ".jpeg"

staging:
  path: ${join(tmpdir(), "cloudalbum-site")}   # Scratch directory reused by every mksite run
`;
}
