import { ApplicationError } from '../application-error';
import type { VariantCandidate } from './device-catalog';

export namespace DeviceConfigError {
  export const Codes = {
    InvalidCatalog: 5001,
    UnknownDevice: 5002,
    AmbiguousCategory: 5003,
    InvalidInterface: 5004,
    InterfaceRequired: 5005,
    UnknownFlashSize: 5006,
    MissingDefaultFlashConfig: 5007,
    MissingAsset: 5008,
  } as const;

  export const InvalidCatalog = ApplicationError.declare(
    Codes.InvalidCatalog,
    (source: string, problems: readonly string[]) => ({
      message: `Invalid device catalog ${source}:\n${problems
        .map((problem) => `  - ${problem}`)
        .join('\n')}`,
      data: { source, problems },
    })
  );

  export const UnknownDevice = ApplicationError.declare(
    Codes.UnknownDevice,
    (device: string, supported: readonly string[]) => ({
      message: `Unsupported device model: ${device}`,
      data: { device, supported },
    })
  );

  export const AmbiguousCategory = ApplicationError.declare(
    Codes.AmbiguousCategory,
    (category: string, candidates: readonly VariantCandidate[]) => ({
      message: `Device ${category} has multiple variants: ${candidates
        .map(({ id }) => id)
        .join(', ')}`,
      data: { category, candidates },
    })
  );

  export const InvalidInterface = ApplicationError.declare(
    Codes.InvalidInterface,
    (category: string, requested: string, supported: readonly string[]) => ({
      message: `Device ${category} does not support ${requested.toUpperCase()} interface`,
      data: { category, requested, supported },
    })
  );

  export const InterfaceRequired = ApplicationError.declare(
    Codes.InterfaceRequired,
    (category: string, supported: readonly string[]) => ({
      message: `Multiple interfaces available for ${category}: ${supported.join(
        ', '
      )}`,
      data: { category, supported },
    })
  );

  export const UnknownFlashSize = ApplicationError.declare(
    Codes.UnknownFlashSize,
    (variant: string, requested: string, available: readonly string[]) => ({
      message: `No FCB file configured for flash size ${requested} of ${variant}`,
      data: { variant, requested, available },
    })
  );

  export const MissingDefaultFlashConfig = ApplicationError.declare(
    Codes.MissingDefaultFlashConfig,
    (variant: string, defaults: readonly string[]) => ({
      message: `Variant ${variant} must mark exactly one flash configuration as default, found ${defaults.length}`,
      data: { variant, defaults },
    })
  );

  export const MissingAsset = ApplicationError.declare(
    Codes.MissingAsset,
    (variant: string, fcbPath: string) => ({
      message: `FCB file does not exist: ${fcbPath}`,
      data: { variant, fcbPath },
    })
  );

  export function is(
    error: unknown
  ): error is ApplicationError<number, unknown> {
    return (
      ApplicationError.is(error) &&
      Object.values(Codes).some((code) => code === error.code)
    );
  }
}
