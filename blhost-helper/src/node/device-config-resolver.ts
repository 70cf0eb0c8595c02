import { inject, injectable } from 'inversify';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  DefaultFlashRegion,
  DeviceCatalog,
  DeviceCategory,
  DeviceConfigError,
  DeviceInterface,
  DeviceMatch,
  DeviceVariant,
  FlashRegions,
  FlashSelection,
  FlashSize,
  ResolveRequest,
  ResolvedDeviceConfig,
  VariantCandidate,
} from '../common/protocol';
import { HelperSettings } from './settings-reader';
import { ErrnoException } from './utils/errors';

/**
 * Resolves a device name (a category or a variant) from the catalog to the interface and flash configuration `blhost` is driven with.
 */
@injectable()
export class DeviceConfigResolver {
  @inject(DeviceCatalog.Token)
  private readonly catalog!: DeviceCatalog;

  @inject(HelperSettings.Token)
  private readonly settings!: HelperSettings;

  supportedModels(): string[] {
    return DeviceCatalog.allModels(this.catalog);
  }

  /**
   * A variant name wins over a category name. A category resolves only when it has exactly one variant.
   */
  lookup(device: string): DeviceMatch {
    const variantMatch = DeviceCatalog.findVariant(this.catalog, device);
    if (variantMatch) {
      return variantMatch;
    }
    const category = Object.hasOwn(this.catalog.devices, device)
      ? this.catalog.devices[device]
      : undefined;
    if (!category) {
      throw DeviceConfigError.UnknownDevice(device, this.supportedModels());
    }
    const variants = Object.entries(category.variants);
    if (variants.length === 1) {
      const [[variantId, variant]] = variants;
      return { categoryId: device, category, variantId, variant };
    }
    throw DeviceConfigError.AmbiguousCategory(device, this.candidates(category));
  }

  candidates(category: DeviceCategory): VariantCandidate[] {
    return Object.entries(category.variants).map(([id, variant]) => ({
      id,
      description: variant.description,
      flashSizes: Object.keys(variant.flash_configs),
    }));
  }

  resolveInterface(match: DeviceMatch, requested?: string): DeviceInterface {
    const { categoryId, category } = match;
    if (requested !== undefined) {
      const normalized = requested.toLowerCase();
      if (
        !DeviceInterface.is(normalized) ||
        !category.interfaces.includes(normalized)
      ) {
        throw DeviceConfigError.InvalidInterface(
          categoryId,
          requested,
          category.interfaces
        );
      }
      return normalized;
    }
    if (category.default_interface) {
      return category.default_interface;
    }
    if (category.interfaces.length === 1) {
      return category.interfaces[0];
    }
    throw DeviceConfigError.InterfaceRequired(categoryId, category.interfaces);
  }

  flashSizeOptions(variant: DeviceVariant): string[] {
    return Object.keys(variant.flash_configs);
  }

  defaultFlashSize(variantId: string, variant: DeviceVariant): string {
    const defaults = Object.entries(variant.flash_configs)
      .filter(([, config]) => config.default)
      .map(([flashSize]) => flashSize);
    if (defaults.length !== 1) {
      throw DeviceConfigError.MissingDefaultFlashConfig(variantId, defaults);
    }
    return defaults[0];
  }

  /**
   * Picks the flash configuration of `requested`, or the default one, and checks that its FCB file exists.
   */
  async resolveFlash(
    match: Pick<DeviceMatch, 'variantId' | 'variant'>,
    requested?: string
  ): Promise<FlashSelection> {
    const { variantId, variant } = match;
    const flashSize = requested ?? this.defaultFlashSize(variantId, variant);
    const flashConfig = Object.hasOwn(variant.flash_configs, flashSize)
      ? variant.flash_configs[flashSize]
      : undefined;
    if (!flashConfig) {
      throw DeviceConfigError.UnknownFlashSize(
        variantId,
        flashSize,
        this.flashSizeOptions(variant)
      );
    }
    const fcbPath = path.resolve(this.settings.fcbDir, flashConfig.fcb_file);
    await this.assertAsset(variantId, fcbPath);
    return {
      flashSize,
      flashSizeBytes: FlashSize.toBytes(flashSize),
      fcbFile: flashConfig.fcb_file,
      fcbPath,
    };
  }

  async resolve(request: ResolveRequest): Promise<ResolvedDeviceConfig> {
    const match = this.lookup(request.device);
    const deviceInterface = this.resolveInterface(match, request.interface);
    const flash = await this.resolveFlash(match, request.flashSize);
    const region = FlashRegions[DefaultFlashRegion];
    return {
      category: match.categoryId,
      variant: match.variantId,
      interface: deviceInterface,
      ...flash,
      defaultAddresses: {
        erase: region.startAddress,
        write: region.startAddress,
        read: region.readAddress,
      },
    };
  }

  private async assertAsset(variantId: string, fcbPath: string): Promise<void> {
    try {
      const stat = await fs.stat(fcbPath);
      if (stat.isFile()) {
        return;
      }
    } catch (err) {
      if (!ErrnoException.isENOENT(err)) {
        throw err;
      }
    }
    throw DeviceConfigError.MissingAsset(variantId, fcbPath);
  }
}
