import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export const ConfigSchema = z.object({
  prompt: z.string().default('> '),
  multiSelect: z.boolean().default(false),
  height: z.number().int().min(1).optional(),
  heightPercentage: z.number().gt(0).max(100).optional(),
  showHelp: z.boolean().default(true),
  showStatus: z.boolean().default(true),
  loadingMessage: z.string().optional(),
  readyMessage: z.string().optional(),
  pollIntervalMs: z.number().int().min(1).default(50),
  spinnerIntervalMs: z.number().int().min(1).default(80),
  cacheSize: z.number().int().min(1).default(64),
  grouping: z
    .object({
      enabled: z.boolean().default(false),
      threshold: z.number().int().min(1).default(10000),
    })
    .default({}),
  colors: z
    .object({
      disable: z.boolean().default(false),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.ffrc.json';

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'ff', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    if (configPath) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return ConfigSchema.parse({});
  }

  try {
    const content = fs.readFileSync(pathToLoad, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }
}

/** NO_COLOR (any non-empty value) wins over the config file. */
export function resolveColorsEnabled(config: Config, env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') return false;
  return !config.colors.disable;
}
