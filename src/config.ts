import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from './utils/index.js';

const ConfigSchema = z.object({
  strictPasswords: z.boolean().default(true),
  emailUsernameEquivalence: z.boolean().default(true),
  detectionThreshold: z.number().min(0).max(1).default(0.5),
}).strict();

export type AppConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = ConfigSchema.parse({});

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.VAULT_DEDUPE_CONFIG ?? path.join(os.homedir(), '.vault-dedupe', 'config.json');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read the JSON config file and apply environment overrides. A missing file
 * means defaults; anything unreadable or invalid is a ConfigError.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const file = configPath(env);

  let fromFile: AppConfig = DEFAULT_CONFIG;
  let raw: string | undefined;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (!isMissingFile(err)) {
      throw new ConfigError(`Cannot read config ${file}: ${errorMessage(err)}`);
    }
  }

  if (raw !== undefined) {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`Config ${file} is not valid JSON: ${errorMessage(err)}`);
    }
    const parsed = ConfigSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new ConfigError(`Invalid config ${file}: ${issues.join('; ')}`);
    }
    fromFile = parsed.data;
  }

  return {
    ...fromFile,
    strictPasswords: env.VAULT_DEDUPE_ALLOW_DIFFERENT_PASSWORDS === '1' ? false : fromFile.strictPasswords,
    emailUsernameEquivalence: env.VAULT_DEDUPE_NO_EMAIL_EQUIVALENCE === '1' ? false : fromFile.emailUsernameEquivalence,
  };
}
