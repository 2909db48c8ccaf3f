/**
 * Loads the user's config file over the embedded defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import defaultsJson from './defaults.json';
import { AppConfigSchema, KEYBINDING_GROUPS, UserConfigSchema } from './schema';
import type { AppConfig, KeybindingGroup, KeybindingsConfig, UserConfig } from './schema';
import { keyId, parseKeyString, validateKeyString } from './keys';
import { getConfigPath } from '../paths';
import { errorMessage } from '../errors';

export interface KeyStringError {
  group: KeybindingGroup;
  name: string;
  message: string;
}

export interface KeyCollision {
  key: string;
  first: string;
  second: string;
}

export interface LoadedConfig {
  config: AppConfig;
  /** File that was read, or that would be read if it existed. */
  path: string;
  fromFile: boolean;
  warnings: string[];
}

export function defaultConfig(): AppConfig {
  return AppConfigSchema.parse(defaultsJson);
}

/**
 * Scalar sections replace the defaults field by field; keybindings merge per
 * key so a user file only needs the bindings it changes.
 */
export function mergeConfig(defaults: AppConfig, user: UserConfig): AppConfig {
  const keybindings = { ...defaults.keybindings };
  for (const group of KEYBINDING_GROUPS) {
    keybindings[group] = { ...defaults.keybindings[group], ...user.keybindings?.[group] };
  }
  return {
    general: { ...defaults.general, ...user.general },
    keybindings,
    theme: { ...defaults.theme, ...user.theme },
    views: user.views ?? defaults.views,
  };
}

export function loadConfig(configPath: string = getConfigPath()): LoadedConfig {
  const defaults = defaultConfig();
  const result: LoadedConfig = { config: defaults, path: configPath, fromFile: false, warnings: [] };

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return result;
    result.warnings.push(`Could not read ${configPath}: ${errorMessage(err)}`);
    return result;
  }

  try {
    const user = UserConfigSchema.parse(JSON.parse(raw));
    result.config = mergeConfig(defaults, user);
    result.fromFile = true;
  } catch (err) {
    result.warnings.push(`Invalid config at ${configPath}: ${describeParseError(err)}`);
    return result;
  }

  for (const e of validateKeybindings(result.config.keybindings)) {
    result.warnings.push(`keybindings.${e.group}.${e.name}: ${e.message}`);
  }
  for (const c of checkCollisions(result.config.keybindings)) {
    result.warnings.push(`Key "${c.key}" is bound by both ${c.first} and ${c.second}`);
  }
  return result;
}

function describeParseError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }
  return errorMessage(err);
}

export function validateKeybindings(config: KeybindingsConfig): KeyStringError[] {
  const errors: KeyStringError[] = [];
  for (const group of KEYBINDING_GROUPS) {
    for (const [name, keyString] of Object.entries(config[group])) {
      const message = validateKeyString(keyString);
      if (message) errors.push({ group, name, message });
    }
  }
  return errors;
}

/** Reports every key bound more than once, across and within groups. */
export function checkCollisions(config: KeybindingsConfig): KeyCollision[] {
  const seen = new Map<string, string>();
  const collisions: KeyCollision[] = [];
  for (const group of KEYBINDING_GROUPS) {
    for (const [name, keyString] of Object.entries(config[group])) {
      const parsed = parseKeyString(keyString);
      const id = parsed ? keyId(parsed) : keyString.trim().toLowerCase();
      const owner = `${group}.${name}`;
      const previous = seen.get(id);
      if (previous) {
        collisions.push({ key: keyString, first: previous, second: owner });
      } else {
        seen.set(id, owner);
      }
    }
  }
  return collisions;
}

/** Writes the default config; refuses to overwrite an existing file. */
export function initConfig(configPath: string = getConfigPath()): string {
  if (fs.existsSync(configPath)) {
    throw new Error(`Config already exists at ${configPath}`);
  }
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(defaultConfig(), null, 2) + '\n');
  return configPath;
}
