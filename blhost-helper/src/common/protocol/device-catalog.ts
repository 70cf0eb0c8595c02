export const InterfaceLiterals = ['usb', 'uart'] as const;
export type DeviceInterface = (typeof InterfaceLiterals)[number];
export namespace DeviceInterface {
  export function is(value: string): value is DeviceInterface {
    return InterfaceLiterals.some((literal) => literal === value);
  }
}

// The property names do not follow the naming conventions of this package. They come from `device_config.json`.
export interface FlashConfig {
  readonly fcb_file: string;
  readonly default: boolean;
}

export interface DeviceVariant {
  readonly description?: string;
  readonly flash_configs: Readonly<Record<string, FlashConfig>>;
}

export interface DeviceCategory {
  readonly description?: string;
  readonly interfaces: readonly DeviceInterface[];
  readonly default_interface?: DeviceInterface;
  readonly variants: Readonly<Record<string, DeviceVariant>>;
}

export interface DeviceCatalog {
  readonly devices: Readonly<Record<string, DeviceCategory>>;
}

export namespace DeviceCatalog {
  export const Token = Symbol('DeviceCatalog');

  /**
   * Categories in catalog order, each followed by its variants. A variant
   * named after its own category is listed once.
   */
  export function allModels(catalog: DeviceCatalog): string[] {
    const models: string[] = [];
    for (const [categoryId, category] of Object.entries(catalog.devices)) {
      models.push(categoryId);
      for (const variantId of Object.keys(category.variants)) {
        if (variantId !== categoryId) {
          models.push(variantId);
        }
      }
    }
    return models;
  }

  export function findVariant(
    catalog: DeviceCatalog,
    variantId: string
  ): DeviceMatch | undefined {
    for (const [categoryId, category] of Object.entries(catalog.devices)) {
      if (Object.hasOwn(category.variants, variantId)) {
        const variant = category.variants[variantId];
        return { categoryId, category, variantId, variant };
      }
    }
    return undefined;
  }
}

export interface DeviceMatch {
  readonly categoryId: string;
  readonly category: DeviceCategory;
  readonly variantId: string;
  readonly variant: DeviceVariant;
}

export interface VariantCandidate {
  readonly id: string;
  readonly description?: string;
  readonly flashSizes: readonly string[];
}

export interface FlashSelection {
  readonly flashSize: string;
  readonly flashSizeBytes?: number;
  readonly fcbFile: string;
  /**
   * Absolute path of the flash configuration block. Checked to exist when resolved.
   */
  readonly fcbPath: string;
}

export interface ResolvedDeviceConfig extends FlashSelection {
  readonly category: string;
  readonly variant: string;
  readonly interface: DeviceInterface;
  readonly defaultAddresses: {
    readonly erase: number;
    readonly write: number;
    readonly read: number;
  };
}

export interface ResolveRequest {
  readonly device: string;
  readonly interface?: string;
  readonly flashSize?: string;
}
