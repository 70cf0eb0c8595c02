export const FlashSizeLiterals = ['4M', '8M', '16M', '32M', '64M'] as const;
export type FlashSize = (typeof FlashSizeLiterals)[number];

export const FlashSizeBytes: Readonly<Record<FlashSize, number>> = {
  '4M': 0x400000,
  '8M': 0x800000,
  '16M': 0x1000000,
  '32M': 0x2000000,
  '64M': 0x4000000,
};

export namespace FlashSize {
  export function is(label: string): label is FlashSize {
    return FlashSizeLiterals.some((literal) => literal === label);
  }
  export function toBytes(label: string): number | undefined {
    return is(label) ? FlashSizeBytes[label] : undefined;
  }
  export function fromBytes(bytes: number): FlashSize | undefined {
    return FlashSizeLiterals.find((label) => FlashSizeBytes[label] === bytes);
  }
}

export const FlashRegionKeys = ['NS', 'S'] as const;
export type FlashRegionKey = (typeof FlashRegionKeys)[number];

export interface FlashRegion {
  readonly name: string;
  readonly startAddress: number;
  /**
   * First byte after the flash configuration block header. Reads default here.
   */
  readonly readAddress: number;
}

export const FlashRegions: Readonly<Record<FlashRegionKey, FlashRegion>> = {
  NS: {
    name: 'External QSPI flash (NS)',
    startAddress: 0x08000000,
    readAddress: 0x08000400,
  },
  S: {
    name: 'External QSPI flash (S)',
    startAddress: 0x18000000,
    readAddress: 0x18000400,
  },
};

export const DefaultFlashRegion: FlashRegionKey = 'NS';

export const MaxEraseBlockSize = 0x100000;
export const DefaultReadSize = 0x200;

// The FCB is staged in RAM and handed to `configure-memory` from there.
export const FcbStagingAddress = 0x2000f000;
export const FcbOptionWord = 0xc0100002;
export const FlexspiNorMemoryId = 9;

export function toHexAddress(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(8, '0')}`;
}

export function toHexSize(value: number): string {
  return `0x${value.toString(16).toUpperCase()}`;
}

/**
 * Addresses are always hexadecimal; the `0x` prefix is optional.
 */
export function parseAddress(raw: string): number | undefined {
  const trimmed = raw.trim();
  const digits = /^0x/i.test(trimmed) ? trimmed.slice(2) : trimmed;
  if (!/^[0-9a-f]+$/i.test(digits)) {
    return undefined;
  }
  return Number.parseInt(digits, 16);
}

/**
 * Sizes take a base prefix (`0x`, `0o`, `0b`) or are decimal.
 */
export function parseSize(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (/^0x[0-9a-f]+$/i.test(trimmed)) {
    return Number.parseInt(trimmed.slice(2), 16);
  }
  if (/^0o[0-7]+$/i.test(trimmed)) {
    return Number.parseInt(trimmed.slice(2), 8);
  }
  if (/^0b[01]+$/i.test(trimmed)) {
    return Number.parseInt(trimmed.slice(2), 2);
  }
  if (/^(0|[1-9]\d*)$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }
  return undefined;
}
