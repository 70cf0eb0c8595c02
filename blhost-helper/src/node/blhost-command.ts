import {
  BlhostConnection,
  FcbOptionWord,
  FcbStagingAddress,
  FlexspiNorMemoryId,
  toHexAddress,
  toHexSize,
} from '../common/protocol';

/**
 * `blhost` sub-commands as argument vectors. Everything after `--` on the `blhost` command line.
 */
export namespace BlhostCommand {
  export function getProperty(tag = 1, memoryId = 0): string[] {
    return ['get-property', String(tag), String(memoryId)];
  }

  export function fillMemory(
    address: number,
    byteCount: number,
    pattern: number,
    unit: 'word' | 'short' | 'byte' = 'word'
  ): string[] {
    return [
      'fill-memory',
      toHexAddress(address),
      String(byteCount),
      toHexAddress(pattern),
      unit,
    ];
  }

  export function writeMemory(address: number, file: string): string[] {
    return ['write-memory', toHexAddress(address), file];
  }

  export function configureMemory(memoryId: number, address: number): string[] {
    return ['configure-memory', String(memoryId), toHexAddress(address)];
  }

  export function flashEraseRegion(
    address: number,
    size: number,
    memoryId = 0
  ): string[] {
    return [
      'flash-erase-region',
      toHexAddress(address),
      toHexSize(size),
      String(memoryId),
    ];
  }

  export function readMemory(address: number, size: number): string[] {
    return ['read-memory', toHexAddress(address), toHexSize(size)];
  }

  /**
   * Stages the option word and the FCB in RAM, then configures the FlexSPI NOR from it.
   */
  export function initializeFlash(fcbPath: string): string[][] {
    return [
      fillMemory(FcbStagingAddress, 4, FcbOptionWord),
      writeMemory(FcbStagingAddress, fcbPath),
      configureMemory(FlexspiNorMemoryId, FcbStagingAddress),
    ];
  }
}

export function buildBlhostArgs(
  connection: BlhostConnection,
  command: readonly string[],
  json: boolean
): string[] {
  return [
    ...BlhostConnection.toArgs(connection),
    ...(json ? ['-j'] : []),
    '--',
    ...command,
  ];
}
