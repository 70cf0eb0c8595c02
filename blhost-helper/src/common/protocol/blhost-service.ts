import type { BlhostConnection } from './blhost-connection';
import type { ResolvedDeviceConfig } from './device-catalog';

/**
 * The device an invocation works on. Resolved once, before any `blhost` command runs.
 */
export const DeviceSession = Symbol('DeviceSession');
export interface DeviceSession {
  readonly device: ResolvedDeviceConfig;
  readonly connection: BlhostConnection;
}

export const BlhostService = Symbol('BlhostService');
export interface BlhostService {
  testConnection(): Promise<boolean>;
  /**
   * Loads the flash configuration block of `flashSize` (the session's flash size when omitted) and configures the FlexSPI NOR memory with it.
   */
  initializeFlash(flashSize?: string): Promise<boolean>;
  erase(options: BlhostService.Erase.Options): Promise<boolean>;
  write(options: BlhostService.Write.Options): Promise<boolean>;
  read(options: BlhostService.Read.Options): Promise<boolean>;
}

export namespace BlhostService {
  export namespace Erase {
    export interface Options {
      /**
       * Prompts for the flash region when absent.
       */
      readonly address?: string;
      /**
       * Prompts for the flash size when absent and the variant has more than one.
       */
      readonly size?: string;
    }
  }
  export namespace Write {
    export interface Options {
      readonly file: string;
      readonly address?: string;
    }
  }
  export namespace Read {
    export interface Options {
      readonly address?: string;
      readonly size?: string;
      readonly output?: string;
    }
  }
}
