import { BlhostError } from './blhost-error';
import type { DeviceInterface } from './device-catalog';

export const DefaultUsbId = '0x1FC9,0x0020';
export const DefaultBaudrate = 2000000;

export type BlhostConnection =
  | {
      readonly interface: 'usb';
      /**
       * `<VID>,<PID>` of the ROM bootloader.
       */
      readonly usbId: string;
    }
  | {
      readonly interface: 'uart';
      readonly port: string;
      readonly baudrate: number;
    };

export namespace BlhostConnection {
  export interface Options {
    readonly port?: string;
    readonly baudrate?: number;
    readonly usbId?: string;
  }

  export function create(
    deviceInterface: DeviceInterface,
    options: Options = {}
  ): BlhostConnection {
    if (deviceInterface === 'usb') {
      return { interface: 'usb', usbId: options.usbId ?? DefaultUsbId };
    }
    if (!options.port) {
      throw BlhostError.SerialPortRequired();
    }
    return {
      interface: 'uart',
      port: options.port,
      baudrate: options.baudrate ?? DefaultBaudrate,
    };
  }

  export function toArgs(connection: BlhostConnection): string[] {
    switch (connection.interface) {
      case 'usb':
        return ['-u', connection.usbId];
      case 'uart':
        return ['-p', `${connection.port},${connection.baudrate}`];
    }
  }

  export function describe(connection: BlhostConnection): string {
    return toArgs(connection).join(' ');
  }
}
