import { Container, injectable } from 'inversify';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import {
  BlhostService,
  DeviceCatalog,
  FlashRegionKey,
  FlashSizeChoice,
  OutputMessage,
  ProgressMessage,
  PromptService,
  ResponseService,
  VariantCandidate,
} from '../../common/protocol';
import { BlhostClient, BlhostResult } from '../../node/blhost-client';
import { BlhostServiceImpl } from '../../node/blhost-service-impl';
import { DeviceConfigResolver } from '../../node/device-config-resolver';
import { DeviceSetup } from '../../node/device-setup';
import { HelperSettings } from '../../node/settings-reader';

export const TestCatalog: DeviceCatalog = {
  devices: {
    FCM363X: {
      description: 'Test module',
      interfaces: ['usb', 'uart'],
      default_interface: 'usb',
      variants: {
        FCM363XAA: {
          description: '4 MB',
          flash_configs: {
            '4M': { fcb_file: 'fcb_4M.bin', default: true },
          },
        },
        FCM363XAC: {
          description: '4 MB or 16 MB',
          flash_configs: {
            '4M': { fcb_file: 'fcb_4M.bin', default: false },
            '16M': { fcb_file: 'fcb_16M.bin', default: true },
          },
        },
      },
    },
    FCM363XL: {
      description: 'UART only module',
      interfaces: ['uart'],
      default_interface: 'uart',
      variants: {
        FCM363XLAC: {
          description: '16 MB',
          flash_configs: {
            '16M': { fcb_file: 'fcb_16M.bin', default: true },
          },
        },
      },
    },
    FCMX: {
      interfaces: ['usb', 'uart'],
      variants: {
        FCMXAA: {
          flash_configs: {
            '4M': { fcb_file: 'fcb_4M.bin', default: true },
            '8M': { fcb_file: 'fcb_8M.bin', default: false },
          },
        },
      },
    },
  },
};

/**
 * Creates the FCB files of `labels` (`fcb_<label>.bin`) in `dir`.
 */
export async function writeFcbFiles(
  dir: string,
  labels: readonly string[] = ['4M', '16M']
): Promise<void> {
  for (const label of labels) {
    await fs.writeFile(join(dir, `fcb_${label}.bin`), Buffer.alloc(512, 0x42));
  }
}

/**
 * Writes an executable shell script named `blhost` into `dir` and returns its path.
 */
export async function writeFakeBlhost(
  dir: string,
  body: string
): Promise<string> {
  const path = join(dir, 'blhost');
  await fs.writeFile(path, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return path;
}

export function createTestSettings(
  overrides: Partial<HelperSettings> = {}
): HelperSettings {
  return { ...HelperSettings.defaults(), ...overrides };
}

@injectable()
export class RecordingResponseService implements ResponseService {
  readonly messages: OutputMessage[] = [];
  readonly progress: ProgressMessage[] = [];

  appendToOutput(message: OutputMessage): void {
    this.messages.push(message);
  }

  reportProgress(message: ProgressMessage): void {
    this.progress.push(message);
  }

  chunks(severity?: OutputMessage.Severity): string[] {
    return this.messages
      .filter((message) => severity === undefined || message.severity === severity)
      .map(({ chunk }) => chunk);
  }
}

@injectable()
export class FakeBlhostClient implements BlhostClient {
  readonly commands: string[][] = [];
  readonly jsonModes: boolean[] = [];
  respond: (
    command: readonly string[]
  ) => Partial<Omit<BlhostResult, 'args'>> = () => ({});

  async run(
    command: readonly string[],
    options: BlhostClient.RunOptions = {}
  ): Promise<BlhostResult> {
    this.commands.push([...command]);
    this.jsonModes.push(options.json ?? false);
    return {
      args: [...command],
      exitCode: 0,
      stdout: '',
      stderr: '',
      ...this.respond(command),
    };
  }

  commandsNamed(name: string): string[][] {
    return this.commands.filter(([subcommand]) => subcommand === name);
  }
}

@injectable()
export class ScriptedPromptService implements PromptService {
  variant: string | undefined;
  region: FlashRegionKey | undefined = 'NS';
  flashSize: FlashSizeChoice | undefined = { kind: 'full' };
  readonly calls: string[] = [];
  candidates: readonly VariantCandidate[] = [];

  async selectVariant(
    category: string,
    candidates: readonly VariantCandidate[]
  ): Promise<string | undefined> {
    this.calls.push(`variant:${category}`);
    this.candidates = candidates;
    return this.variant;
  }

  async selectFlashRegion(): Promise<FlashRegionKey | undefined> {
    this.calls.push('region');
    return this.region;
  }

  async selectFlashSize(
    variant: string,
    flashSizes: readonly string[]
  ): Promise<FlashSizeChoice | undefined> {
    this.calls.push(`flashSize:${variant}:${flashSizes.join(',')}`);
    return this.flashSize;
  }
}

export function createTestContainer(
  settings: HelperSettings,
  catalog: DeviceCatalog = TestCatalog
): Container {
  const container = new Container({ defaultScope: 'Singleton' });
  container.bind(HelperSettings.Token).toConstantValue(settings);
  container.bind(DeviceCatalog.Token).toConstantValue(catalog);
  container.bind(RecordingResponseService).toSelf().inSingletonScope();
  container.bind(ResponseService).toService(RecordingResponseService);
  container.bind(ScriptedPromptService).toSelf().inSingletonScope();
  container.bind(PromptService).toService(ScriptedPromptService);
  container.bind(DeviceConfigResolver).toSelf().inSingletonScope();
  container.bind(DeviceSetup).toSelf().inSingletonScope();
  container.bind(FakeBlhostClient).toSelf().inSingletonScope();
  container.bind(BlhostClient).toService(FakeBlhostClient);
  container.bind(BlhostServiceImpl).toSelf().inSingletonScope();
  container.bind(BlhostService).toService(BlhostServiceImpl);
  return container;
}

/**
 * The rejection reason of `promise`. Fails when it resolves.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected the promise to reject');
}
