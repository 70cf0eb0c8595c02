import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DefaultBaudrate, DefaultUsbId } from '../common/protocol';
import { parseJsonc } from './jsonc-parser';
import {
  blhostPath,
  deviceCatalogPath,
  fcbDirPath,
  outputDirPath,
  settingsPath,
} from './resources';
import { ErrnoException } from './utils/errors';

export interface HelperSettings {
  readonly blhostPath: string;
  readonly catalogPath: string;
  readonly fcbDir: string;
  readonly outputDir: string;
  readonly baudrate: number;
  readonly timeoutMs: number;
  readonly usbId: string;
  /**
   * Echo every `blhost` command line and its raw output.
   */
  readonly debug: boolean;
}

export namespace HelperSettings {
  export const Token = Symbol('HelperSettings');

  export const DefaultTimeoutMs = 60_000;

  export function defaults(): HelperSettings {
    return {
      blhostPath,
      catalogPath: deviceCatalogPath,
      fcbDir: fcbDirPath,
      outputDir: outputDirPath,
      baudrate: DefaultBaudrate,
      timeoutMs: DefaultTimeoutMs,
      usbId: DefaultUsbId,
      debug: false,
    };
  }
}

const SettingsFileSchema = z
  .object({
    blhostPath: z.string().min(1),
    catalogPath: z.string().min(1),
    fcbDir: z.string().min(1),
    outputDir: z.string().min(1),
    baudrate: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    usbId: z.string().regex(/^0x[0-9a-f]{1,4},0x[0-9a-f]{1,4}$/i),
    debug: z.boolean(),
  })
  .partial()
  .strict();

export type PartialSettings = { -readonly [K in keyof HelperSettings]?: HelperSettings[K] };

/**
 * Reads the optional JSONC settings file. A missing file yields `undefined`; an unreadable or invalid one is reported to `onWarning` and ignored.
 */
export async function readSettingsFile(
  filePath: string,
  onWarning: (message: string) => void = console.warn
): Promise<PartialSettings | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, { encoding: 'utf8' });
  } catch (err) {
    if (ErrnoException.isENOENT(err)) {
      return undefined;
    }
    throw err;
  }
  const { value, errors } = parseJsonc(raw);
  if (errors.length) {
    onWarning(
      `Could not parse the settings file ${filePath} (${errors.join(
        ', '
      )}). Ignoring settings file.`
    );
    return undefined;
  }
  const result = SettingsFileSchema.safeParse(value ?? {});
  if (!result.success) {
    onWarning(
      `Invalid settings file ${filePath}: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ')}. Ignoring settings file.`
    );
    return undefined;
  }
  const settings = result.data;
  // Relative paths in the settings file are relative to the file itself.
  const dir = path.dirname(filePath);
  for (const key of ['catalogPath', 'fcbDir', 'outputDir'] as const) {
    const configured = settings[key];
    if (configured !== undefined) {
      settings[key] = path.resolve(dir, configured);
    }
  }
  return settings;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): PartialSettings {
  const settings: PartialSettings = {};
  if (env['BLHOST_PATH']) {
    settings.blhostPath = env['BLHOST_PATH'];
  }
  return settings;
}

const SettingKeys = [
  'blhostPath',
  'catalogPath',
  'fcbDir',
  'outputDir',
  'baudrate',
  'timeoutMs',
  'usbId',
  'debug',
] as const satisfies readonly (keyof HelperSettings)[];

function copyDefined<K extends keyof HelperSettings>(
  target: PartialSettings,
  source: PartialSettings,
  key: K
): void {
  const value = source[key];
  if (value !== undefined) {
    target[key] = value;
  }
}

function definedOnly(settings: PartialSettings): PartialSettings {
  const result: PartialSettings = {};
  for (const key of SettingKeys) {
    copyDefined(result, settings, key);
  }
  return result;
}

/**
 * Defaults, overridden by the settings file, overridden by the environment, overridden by `overrides` (the command line).
 */
export async function resolveSettings(
  overrides: PartialSettings = {},
  options: {
    readonly env?: NodeJS.ProcessEnv;
    readonly onWarning?: (message: string) => void;
  } = {}
): Promise<HelperSettings> {
  const env = options.env ?? process.env;
  const file = await readSettingsFile(
    env['BLHOST_HELPER_SETTINGS'] || settingsPath,
    options.onWarning
  );
  return Object.freeze({
    ...HelperSettings.defaults(),
    ...definedOnly(file ?? {}),
    ...definedOnly(settingsFromEnv(env)),
    ...definedOnly(overrides),
  });
}
