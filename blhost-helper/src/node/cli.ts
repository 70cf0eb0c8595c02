#!/usr/bin/env node
import 'reflect-metadata';
import chalk from 'chalk';
import { Container } from 'inversify';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  ApplicationError,
} from '../common/application-error';
import {
  BlhostService,
  InterfaceLiterals,
  OutputMessage,
  ResponseService,
} from '../common/protocol';
import {
  bindDeviceSession,
  createBlhostHelperContainer,
} from './blhost-helper-module';
import { loadCatalog } from './catalog-loader';
import { formatDeviceList } from './device-list';
import { DeviceSetup } from './device-setup';
import { PromptServiceImpl } from './prompt-service-impl';
import { resolveSettings } from './settings-reader';

const Operations = ['test', 'read', 'write', 'erase', 'list'] as const;
type Operation = (typeof Operations)[number];

interface OperationArguments {
  readonly device: string;
  readonly interface?: string;
  readonly flashSize?: string;
  readonly port?: string;
  readonly baudrate?: number;
  readonly addr?: string;
  readonly size?: string;
  readonly file?: string;
  readonly output?: string;
}

const Epilog = `Examples:
  # List all supported devices
  $0 --list

  # Test connection (using the default interface of the device)
  $0 -d FCM363X --test
  $0 -d FCM363XL -p COM3 --test

  # Specify variant explicitly (avoids selection prompt)
  $0 -d FCM363XAB --test

  # Read FLASH memory
  $0 -d FCM363X --read -a 0x08000400 -s 0x200 -o test.bin

  # Erase FLASH (address and size are optional, will prompt if not specified)
  $0 -d FGMH63X --erase
  $0 -d FCM363X --erase -a 0x08000000 -s 0x800000

  # Write firmware to FLASH
  $0 -d FCM363XAC --write -f firmware.bin -a 0x08000000

  # Override default interface, show every blhost command
  $0 -d FCM363X -i uart -p COM5 --test --debug`;

function createParser(argv: readonly string[]) {
  return yargs(argv)
    .scriptName('blhost-helper')
    .usage(
      'NXP RW61x BLHOST helper: erase, write and read the external flash through blhost.\n\nUsage: $0 -d <device> [--test | --read | --write | --erase] [options]'
    )
    .option('device', {
      alias: 'd',
      type: 'string',
      describe:
        'Device model (category or specific variant, e.g., FCM363X or FCM363XAA)',
    })
    .option('interface', {
      alias: 'i',
      choices: InterfaceLiterals,
      coerce: (value: string) => value.toLowerCase(),
      describe:
        'Connection interface (optional if default is set in the device catalog)',
    })
    .option('port', {
      alias: 'p',
      type: 'string',
      describe:
        'Serial port (required for UART, e.g., COM3 on Windows, /dev/ttyUSB0 on Linux)',
    })
    .option('baudrate', {
      alias: 'b',
      type: 'number',
      describe: 'Baud rate (optional for UART, default: 2000000)',
    })
    .option('flash-size', {
      type: 'string',
      describe: 'Flash size label (e.g., 8M). Defaults to the variant default',
    })
    .option('debug', {
      type: 'boolean',
      default: false,
      describe: 'Show detailed debug information',
    })
    .option('test', { type: 'boolean', describe: 'Test connection' })
    .option('read', { type: 'boolean', describe: 'Read FLASH' })
    .option('write', { type: 'boolean', describe: 'Write firmware' })
    .option('erase', { type: 'boolean', describe: 'Erase FLASH' })
    .option('list', { type: 'boolean', describe: 'List supported devices' })
    .option('addr', {
      alias: 'a',
      type: 'string',
      describe: 'Address (e.g.: 0x08000000, optional)',
    })
    .option('size', {
      alias: 's',
      type: 'string',
      describe: 'Size (e.g.: 0x1000, optional)',
    })
    .option('file', { alias: 'f', type: 'string', describe: 'File path' })
    .option('output', { alias: 'o', type: 'string', describe: 'Output file' })
    .option('catalog', {
      type: 'string',
      describe: 'Device catalog JSON file',
    })
    .option('fcb-dir', {
      type: 'string',
      describe: 'Directory of the flash configuration block files',
    })
    .option('output-dir', {
      type: 'string',
      describe: 'Directory of the files written by --read',
    })
    .option('blhost', { type: 'string', describe: 'blhost executable' })
    .check((args) => {
      const selected = Operations.filter((operation) => args[operation]);
      if (selected.length > 1) {
        throw new Error(
          `Arguments ${selected
            .map((operation) => `--${operation}`)
            .join(', ')} are mutually exclusive`
        );
      }
      const { baudrate } = args;
      if (
        baudrate !== undefined &&
        (!Number.isInteger(baudrate) || baudrate <= 0)
      ) {
        throw new Error(`Invalid baud rate: ${baudrate}`);
      }
      return true;
    })
    .fail((message, err) => {
      throw err ?? new Error(message);
    })
    .epilog(Epilog)
    .strict()
    .help()
    .alias('h', 'help');
}

function printError(message: string): void {
  console.error(chalk.red(message));
}

interface Arguments {
  readonly blhost?: string;
  readonly catalog?: string;
  readonly fcbDir?: string;
  readonly outputDir?: string;
  readonly debug: boolean;
}

async function loadConfiguration(args: Arguments) {
  const settings = await resolveSettings({
    blhostPath: args.blhost,
    catalogPath: args.catalog,
    fcbDir: args.fcbDir,
    outputDir: args.outputDir,
    debug: args.debug,
  });
  const catalog = await loadCatalog(settings.catalogPath);
  return { settings, catalog };
}

export async function main(argv: readonly string[]): Promise<number> {
  const parser = createParser(argv);
  // Failed validation throws synchronously from `parseAsync`.
  const args = await Promise.resolve()
    .then(() => parser.parseAsync())
    .catch((err: unknown) => {
      printError(`❌ ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    });
  if (!args) {
    return 1;
  }
  const operation = Operations.find((candidate) => args[candidate]);

  if (operation === 'list') {
    const { catalog } = await loadConfiguration(args);
    console.log(formatDeviceList(catalog).join('\n'));
    return 0;
  }
  const { device } = args;
  if (!device) {
    if (!operation) {
      parser.showHelp();
      return 0;
    }
    printError('❌ Device model must be specified');
    return 1;
  }

  const { settings, catalog } = await loadConfiguration(args);
  const container = createBlhostHelperContainer(settings, catalog);
  try {
    return await runOperation(container, operation, { ...args, device });
  } finally {
    container.get(PromptServiceImpl).dispose();
  }
}

async function runOperation(
  container: Container,
  operation: Operation | undefined,
  args: OperationArguments
): Promise<number> {
  const session = await container.get(DeviceSetup).setup({
    device: args.device,
    interface: args.interface,
    flashSize: args.flashSize,
    port: args.port,
    baudrate: args.baudrate,
  });
  if (!session) {
    return 1;
  }
  bindDeviceSession(container, session);

  const responseService = container.get<ResponseService>(ResponseService);
  const separator = () =>
    responseService.appendToOutput({ chunk: '-'.repeat(50) + '\n' });
  const service = container.get<BlhostService>(BlhostService);

  separator();
  let success: boolean;
  switch (operation) {
    case 'read':
      success = await service.read({
        address: args.addr,
        size: args.size,
        output: args.output,
      });
      break;
    case 'write':
      if (!args.file) {
        printError('❌ Write operation requires file specification');
        return 1;
      }
      success = await service.write({ file: args.file, address: args.addr });
      break;
    case 'erase':
      success = await service.erase({ address: args.addr, size: args.size });
      break;
    default:
      success = await service.testConnection();
  }
  separator();
  responseService.appendToOutput(
    success
      ? {
          chunk: '✅ Operation successful\n',
          severity: OutputMessage.Severity.Success,
        }
      : {
          chunk: '❌ Operation failed\n',
          severity: OutputMessage.Severity.Error,
        }
  );
  return success ? 0 : 1;
}

if (require.main === module) {
  process.on('SIGINT', () => {
    printError('\nUser interrupted operation');
    process.exit(1);
  });
  main(hideBin(process.argv)).then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (err: unknown) => {
      printError(
        ApplicationError.is(err)
          ? `\n❌ ${err.message}`
          : `\n❌ Unknown error: ${
              err instanceof Error ? err.message : String(err)
            }`
      );
      process.exitCode = 1;
    }
  );
}
