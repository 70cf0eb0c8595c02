import path from 'node:path';

// Single entry point of all install-relative paths. `BLHOST_HELPER_RESOURCES` relocates them, for example when the package is bundled.
export const resourcesPath =
  process.env['BLHOST_HELPER_RESOURCES'] ||
  path.join(__dirname, '..', '..', 'resources');
const exe = process.platform === 'win32' ? '.exe' : '';

// Device catalog and the flash configuration blocks it references
export const deviceCatalogPath = path.join(resourcesPath, 'device_config.json');
export const fcbDirPath = path.join(resourcesPath, 'fcb');

// Optional settings file
export const settingsPath = path.join(resourcesPath, 'blhost-helper.json');

// Executables. Looked up on the `PATH` unless configured otherwise.
export const blhostPath = 'blhost' + exe;

export const outputDirPath = path.join(process.cwd(), 'output');
