import execa from 'execa';
import { inject, injectable } from 'inversify';
import { Writable } from 'node:stream';
import {
  BlhostError,
  DeviceSession,
  OutputMessage,
  ResponseService,
} from '../common/protocol';
import { buildBlhostArgs } from './blhost-command';
import { HelperSettings } from './settings-reader';

export interface BlhostResult {
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  /**
   * The parsed stdout. Only present in JSON mode, on a zero exit code and when stdout is valid JSON.
   */
  readonly json?: unknown;
}

export namespace BlhostResult {
  export function isSuccess(result: BlhostResult): boolean {
    return result.exitCode === 0;
  }
}

export const BlhostClient = Symbol('BlhostClient');
export interface BlhostClient {
  run(
    command: readonly string[],
    options?: BlhostClient.RunOptions
  ): Promise<BlhostResult>;
}
export namespace BlhostClient {
  export interface RunOptions {
    /**
     * Passes `-j` to `blhost` and parses its stdout.
     */
    readonly json?: boolean;
  }
}

@injectable()
export class BlhostClientImpl implements BlhostClient {
  @inject(ResponseService)
  private readonly responseService!: ResponseService;

  @inject(HelperSettings.Token)
  private readonly settings!: HelperSettings;

  @inject(DeviceSession)
  private readonly session!: DeviceSession;

  async run(
    command: readonly string[],
    options: BlhostClient.RunOptions = {}
  ): Promise<BlhostResult> {
    const json = options.json ?? false;
    const { blhostPath, timeoutMs, debug } = this.settings;
    const args = buildBlhostArgs(this.session.connection, command, json);
    if (debug) {
      this.debug(`Executing: ${[blhostPath, ...args].join(' ')}\n`);
    }
    const subprocess = execa(blhostPath, args, {
      reject: false,
      timeout: timeoutMs,
    });
    if (debug) {
      const { stdout, stderr } = this.createWritableWrappers();
      subprocess.stdout?.pipe(stdout);
      subprocess.stderr?.pipe(stderr);
    }
    const result = await subprocess;
    if (result.timedOut) {
      throw BlhostError.Timeout(args, timeoutMs);
    }
    // Without an exit code the process never ran (missing executable, permissions).
    if (result.failed && !Number.isInteger(result.exitCode)) {
      const reason =
        'shortMessage' in result && typeof result.shortMessage === 'string'
          ? result.shortMessage
          : 'process did not start';
      throw BlhostError.SpawnFailed(blhostPath, reason);
    }
    if (debug) {
      this.debug(`Return code: ${result.exitCode}\n`);
    }
    const { exitCode, stdout, stderr } = result;
    if (json && exitCode === 0 && stdout.trim()) {
      try {
        return { args, exitCode, stdout, stderr, json: JSON.parse(stdout) };
      } catch (err) {
        this.responseService.appendToOutput({
          chunk: `JSON parsing failed: ${
            err instanceof Error ? err.message : String(err)
          }\n`,
          severity: OutputMessage.Severity.Warning,
        });
      }
    }
    return { args, exitCode, stdout, stderr };
  }

  private debug(chunk: string): void {
    this.responseService.appendToOutput({
      chunk,
      severity: OutputMessage.Severity.Info,
    });
  }

  private createWritableWrappers(): Readonly<{
    stdout: Writable;
    stderr: Writable;
  }> {
    const options: ResponseServiceWritableOptions = {
      responseService: this.responseService,
      severity: OutputMessage.Severity.Info,
    };
    return {
      stdout: new ResponseServiceWritable(options),
      stderr: new ResponseServiceWritable({
        ...options,
        severity: OutputMessage.Severity.Error,
      }),
    };
  }
}

interface ResponseServiceWritableOptions {
  readonly responseService: ResponseService;
  readonly severity: OutputMessage.Severity;
}

class ResponseServiceWritable extends Writable {
  constructor(private readonly options: ResponseServiceWritableOptions) {
    super();
  }

  override _write(
    chunk: Buffer | string,
    _: BufferEncoding,
    callback: (error?: Error | null | undefined) => void
  ): void {
    this.options.responseService.appendToOutput({
      chunk: chunk.toString(),
      severity: this.options.severity,
    });
    callback();
  }
}
