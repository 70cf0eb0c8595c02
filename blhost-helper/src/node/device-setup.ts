import { inject, injectable } from 'inversify';
import {
  BlhostConnection,
  BlhostError,
  DeviceConfigError,
  DeviceSession,
  OutputMessage,
  PromptService,
  ResolveRequest,
  ResolvedDeviceConfig,
  ResponseService,
} from '../common/protocol';
import { DeviceConfigResolver } from './device-config-resolver';
import { HelperSettings } from './settings-reader';

/**
 * Turns the device options of the command line into a session. Reports every failure to the user and yields `undefined` instead of throwing for
 * anything the user can correct.
 */
@injectable()
export class DeviceSetup {
  @inject(DeviceConfigResolver)
  private readonly resolver!: DeviceConfigResolver;

  @inject(PromptService)
  private readonly promptService!: PromptService;

  @inject(ResponseService)
  private readonly responseService!: ResponseService;

  @inject(HelperSettings.Token)
  private readonly settings!: HelperSettings;

  async setup(options: DeviceSetup.Options): Promise<DeviceSession | undefined> {
    const device = await this.resolveDevice(options);
    if (!device) {
      return undefined;
    }
    let connection: BlhostConnection;
    try {
      connection = BlhostConnection.create(device.interface, {
        port: options.port,
        baudrate: options.baudrate ?? this.settings.baudrate,
        usbId: this.settings.usbId,
      });
    } catch (err) {
      if (BlhostError.SerialPortRequired.is(err)) {
        this.error(`Error: ${err.message}`);
        return undefined;
      }
      throw err;
    }
    this.info(`Device Category: ${device.category}`);
    this.info(`Device Variant: ${device.variant}`);
    this.info(`Interface: ${device.interface.toUpperCase()}`);
    this.info(`Flash size: ${device.flashSize} (FCB: ${device.fcbFile})`);
    this.info(`Connection params: ${BlhostConnection.describe(connection)}`);
    return { device, connection };
  }

  private async resolveDevice(
    request: ResolveRequest
  ): Promise<ResolvedDeviceConfig | undefined> {
    let device: ResolvedDeviceConfig;
    try {
      device = await this.resolver.resolve(request);
    } catch (err) {
      if (DeviceConfigError.AmbiguousCategory.is(err)) {
        const { category, candidates } = err.data;
        const variant = await this.promptService.selectVariant(
          category,
          candidates
        );
        return variant === undefined
          ? undefined
          : this.resolveDevice({ ...request, device: variant });
      }
      if (DeviceConfigError.UnknownDevice.is(err)) {
        this.error(`Error: ${err.message}`);
        this.error(`Supported models: ${err.data.supported.join(', ')}`);
        return undefined;
      }
      if (DeviceConfigError.InvalidInterface.is(err)) {
        this.error(`Error: ${err.message}`);
        this.error(`Supported interfaces: ${err.data.supported.join(', ')}`);
        return undefined;
      }
      if (DeviceConfigError.InterfaceRequired.is(err)) {
        this.error(`Error: ${err.message}`);
        this.error('Please specify interface with -i option');
        return undefined;
      }
      if (DeviceConfigError.is(err)) {
        this.error(`Error: ${err.message}`);
        return undefined;
      }
      throw err;
    }
    if (device.category === request.device && device.variant !== request.device) {
      this.info(`Auto-selected variant: ${device.variant}`);
    }
    if (request.interface === undefined) {
      this.info(`Using interface: ${device.interface.toUpperCase()}`);
    }
    return device;
  }

  private info(message: string): void {
    this.responseService.appendToOutput({
      chunk: message + '\n',
      severity: OutputMessage.Severity.Info,
    });
  }

  private error(message: string): void {
    this.responseService.appendToOutput({
      chunk: message + '\n',
      severity: OutputMessage.Severity.Error,
    });
  }
}

export namespace DeviceSetup {
  export interface Options extends ResolveRequest {
    readonly port?: string;
    readonly baudrate?: number;
  }
}
