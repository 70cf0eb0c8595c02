import { ApplicationError } from '../application-error';

export namespace BlhostError {
  export const Codes = {
    SpawnFailed: 5101,
    Timeout: 5102,
    SerialPortRequired: 5103,
  } as const;

  export const SpawnFailed = ApplicationError.declare(
    Codes.SpawnFailed,
    (executable: string, reason: string) => ({
      message: `Command execution error: could not run ${executable}: ${reason}`,
      data: { executable, reason },
    })
  );

  export const Timeout = ApplicationError.declare(
    Codes.Timeout,
    (command: readonly string[], timeoutMs: number) => ({
      message: `Command execution timeout after ${timeoutMs} ms: ${command.join(
        ' '
      )}`,
      data: { command, timeoutMs },
    })
  );

  export const SerialPortRequired = ApplicationError.declare(
    Codes.SerialPortRequired,
    () => ({
      message:
        'UART interface requires serial port specification (-p option)\nExamples: -p COM3 (Windows), -p /dev/ttyUSB0 (Linux)',
      data: undefined,
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
