import { inject, injectable } from 'inversify';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  BlhostService,
  DefaultReadSize,
  DeviceConfigError,
  DeviceSession,
  FlashRegions,
  FlashSize,
  MaxEraseBlockSize,
  OutputMessage,
  PromptService,
  ResponseService,
  parseAddress,
  parseSize,
  toHexAddress,
  toHexSize,
} from '../common/protocol';
import { BlhostClient, BlhostResult } from './blhost-client';
import { BlhostCommand } from './blhost-command';
import {
  BlhostStatusResponse,
  decodeHexDump,
  knownErrorMessage,
} from './blhost-output-parser';
import { DeviceConfigResolver } from './device-config-resolver';
import { HelperSettings } from './settings-reader';
import { ErrnoException } from './utils/errors';

/**
 * `YYYYMMDD_HHMMSS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(
      date.getSeconds()
    )}`
  );
}

@injectable()
export class BlhostServiceImpl implements BlhostService {
  @inject(BlhostClient)
  private readonly client!: BlhostClient;

  @inject(ResponseService)
  private readonly responseService!: ResponseService;

  @inject(PromptService)
  private readonly promptService!: PromptService;

  @inject(DeviceConfigResolver)
  private readonly resolver!: DeviceConfigResolver;

  @inject(DeviceSession)
  private readonly session!: DeviceSession;

  @inject(HelperSettings.Token)
  private readonly settings!: HelperSettings;

  async testConnection(): Promise<boolean> {
    this.info('Testing device connection...');
    const result = await this.client.run(BlhostCommand.getProperty(1, 0), {
      json: true,
    });
    const response =
      result.json === undefined
        ? undefined
        : BlhostStatusResponse.parse(result.json);
    if (response) {
      if (BlhostStatusResponse.isSuccess(response)) {
        this.success('✅ Device connection successful');
        const [version] = response.response;
        if (version !== undefined) {
          this.info(`Device version: ${toHexAddress(version)}`);
        }
        return true;
      }
      this.error('❌ Device response status error');
      this.error(`Status: ${JSON.stringify(response.status)}`);
      return false;
    }
    if (BlhostResult.isSuccess(result)) {
      this.success('✅ Device connection successful (non-JSON response)');
      return true;
    }
    this.error('❌ Device connection failed');
    this.reportFailure(result);
    return false;
  }

  async initializeFlash(flashSize?: string): Promise<boolean> {
    this.info('Initializing FLASH...');
    const { device } = this.session;
    const requested = flashSize ?? device.flashSize;
    if (flashSize === undefined) {
      this.info(`Using flash size: ${requested}`);
    }
    const match = this.resolver.lookup(device.variant);
    let fcbPath: string;
    try {
      ({ fcbPath } = await this.resolver.resolveFlash(match, requested));
    } catch (err) {
      if (DeviceConfigError.is(err)) {
        this.error(`❌ ${err.message}`);
        return false;
      }
      throw err;
    }
    this.info(`Using FCB file: ${path.basename(fcbPath)}`);
    for (const command of BlhostCommand.initializeFlash(fcbPath)) {
      const result = await this.client.run(command);
      if (!BlhostResult.isSuccess(result)) {
        this.error(`❌ Initialization failed: ${command.join(' ')}`);
        this.reportFailure(result);
        return false;
      }
    }
    this.success('✅ FLASH initialization successful');
    return true;
  }

  async erase(options: BlhostService.Erase.Options): Promise<boolean> {
    const startAddress = await this.eraseStartAddress(options.address);
    if (startAddress === undefined) {
      return false;
    }
    const selection = await this.eraseSize(options.size);
    if (!selection) {
      return false;
    }
    return this.eraseRange(
      startAddress,
      selection.sizeBytes,
      selection.flashSize
    );
  }

  async write(options: BlhostService.Write.Options): Promise<boolean> {
    const { file } = options;
    let size: number;
    try {
      ({ size } = await fs.stat(file));
    } catch (err) {
      if (ErrnoException.isENOENT(err)) {
        this.error(`❌ Firmware file does not exist: ${file}`);
        return false;
      }
      throw err;
    }
    if (size === 0) {
      this.error('❌ Firmware file is empty');
      return false;
    }
    const startAddress = this.addressOrDefault(
      options.address,
      this.session.device.defaultAddresses.write
    );
    if (startAddress === undefined) {
      return false;
    }
    this.info(`Firmware file: ${file} (${size} bytes)`);
    if (!(await this.eraseRange(startAddress, size, FlashSize.fromBytes(size)))) {
      return false;
    }
    this.info(`Starting firmware write to ${toHexAddress(startAddress)}...`);
    const result = await this.client.run(
      BlhostCommand.writeMemory(startAddress, file)
    );
    if (!BlhostResult.isSuccess(result)) {
      this.error('❌ Firmware write failed');
      this.reportFailure(result);
      return false;
    }
    this.success('✅ Firmware write successful');
    return true;
  }

  async read(options: BlhostService.Read.Options): Promise<boolean> {
    if (!(await this.initializeFlash())) {
      return false;
    }
    const { device } = this.session;
    const address = this.addressOrDefault(
      options.address,
      device.defaultAddresses.read
    );
    if (address === undefined) {
      return false;
    }
    const size =
      options.size === undefined ? DefaultReadSize : parseSize(options.size);
    if (size === undefined || size <= 0) {
      this.error(`❌ Invalid read size: ${options.size}`);
      return false;
    }
    const outputPath =
      options.output ??
      path.join(
        this.settings.outputDir,
        `${device.variant}_${toHexAddress(address)}_${formatTimestamp(
          new Date()
        )}.bin`
      );
    this.info(`Reading FLASH: ${toHexAddress(address)}, size: ${toHexSize(size)}`);
    this.info(`Output file: ${outputPath}`);
    const result = await this.client.run(BlhostCommand.readMemory(address, size));
    if (!BlhostResult.isSuccess(result)) {
      this.error('❌ FLASH read failed');
      this.reportFailure(result);
      return false;
    }
    const data = decodeHexDump(result.stdout);
    if (!data.length) {
      this.error('❌ No valid hex data found');
      this.error('❌ Hex data parsing failed');
      return false;
    }
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, data);
    this.info(`Saved ${data.length} bytes to ${outputPath}`);
    this.success('✅ FLASH read successful');
    return true;
  }

  private async eraseStartAddress(
    address: string | undefined
  ): Promise<number | undefined> {
    if (address !== undefined) {
      return this.parseAddressOption(address);
    }
    const regionKey = await this.promptService.selectFlashRegion();
    if (!regionKey) {
      this.error('❌ No valid FLASH region selected');
      return undefined;
    }
    const region = FlashRegions[regionKey];
    this.info(
      `Selected FLASH region: ${region.name} (${toHexAddress(
        region.startAddress
      )})`
    );
    return region.startAddress;
  }

  /**
   * The erase size in bytes and, when it matches one, the flash size label whose FCB is loaded before erasing.
   */
  private async eraseSize(
    size: string | undefined
  ): Promise<{ sizeBytes: number; flashSize?: string } | undefined> {
    if (size !== undefined) {
      const sizeBytes = parseSize(size);
      if (sizeBytes === undefined || sizeBytes <= 0) {
        this.error('❌ Invalid erase size');
        return undefined;
      }
      return { sizeBytes, flashSize: FlashSize.fromBytes(sizeBytes) };
    }
    const { variant } = this.session.device;
    const match = this.resolver.lookup(variant);
    const options = this.resolver.flashSizeOptions(match.variant);
    let flashSize: string;
    if (options.length === 1) {
      [flashSize] = options;
    } else {
      const choice = await this.promptService.selectFlashSize(variant, options);
      if (!choice) {
        this.error('❌ No valid FLASH size selected');
        return undefined;
      }
      flashSize =
        choice.kind === 'size'
          ? choice.flashSize
          : this.resolver.defaultFlashSize(variant, match.variant);
    }
    const sizeBytes = FlashSize.toBytes(flashSize);
    if (sizeBytes === undefined) {
      this.error('❌ Invalid erase size');
      return undefined;
    }
    if (options.length === 1) {
      this.info(
        `Auto-selected FLASH size: ${flashSize} (${sizeBytes.toLocaleString(
          'en-US'
        )} bytes) - full erase`
      );
    }
    return { sizeBytes, flashSize };
  }

  private async eraseRange(
    startAddress: number,
    sizeBytes: number,
    flashSize: string | undefined
  ): Promise<boolean> {
    if (!(await this.initializeFlash(flashSize))) {
      return false;
    }
    this.info(
      `Starting FLASH erase: ${toHexAddress(
        startAddress
      )}, size: ${sizeBytes.toLocaleString('en-US')} bytes`
    );
    let address = startAddress;
    let remaining = sizeBytes;
    while (remaining > 0) {
      const blockSize = Math.min(remaining, MaxEraseBlockSize);
      const done = sizeBytes - remaining;
      this.responseService.reportProgress({
        message: `Erase progress: ${((done / sizeBytes) * 100).toFixed(
          1
        )}% - ${toHexAddress(address)} (${toHexSize(blockSize)})`,
        work: { done, total: sizeBytes },
      });
      const result = await this.client.run(
        BlhostCommand.flashEraseRegion(address, blockSize)
      );
      if (!BlhostResult.isSuccess(result)) {
        this.error(`❌ Erase failed: ${toHexAddress(address)}`);
        this.reportFailure(result);
        return false;
      }
      address += blockSize;
      remaining -= blockSize;
    }
    this.success('✅ FLASH erase completed');
    return true;
  }

  private addressOrDefault(
    address: string | undefined,
    defaultAddress: number
  ): number | undefined {
    return address === undefined
      ? defaultAddress
      : this.parseAddressOption(address);
  }

  private parseAddressOption(address: string): number | undefined {
    const parsed = parseAddress(address);
    if (parsed === undefined) {
      this.error(`❌ Invalid address: ${address}`);
    }
    return parsed;
  }

  private reportFailure(result: BlhostResult): void {
    const stderr = result.stderr.trim();
    if (!stderr) {
      return;
    }
    this.error(knownErrorMessage(stderr) ?? `Error: ${stderr}`);
  }

  private info(message: string): void {
    this.append(message, OutputMessage.Severity.Info);
  }

  private success(message: string): void {
    this.append(message, OutputMessage.Severity.Success);
  }

  private error(message: string): void {
    this.append(message, OutputMessage.Severity.Error);
  }

  private append(message: string, severity: OutputMessage.Severity): void {
    this.responseService.appendToOutput({ chunk: message + '\n', severity });
  }
}
