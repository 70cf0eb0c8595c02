import { inject, injectable } from 'inversify';
import { Interface, createInterface } from 'node:readline';
import {
  DefaultFlashRegion,
  FlashRegionKey,
  FlashRegionKeys,
  FlashRegions,
  FlashSize,
  FlashSizeChoice,
  OutputMessage,
  PromptService,
  ResponseService,
  VariantCandidate,
  toHexAddress,
  toHexSize,
} from '../common/protocol';

/**
 * One-based menu input to a zero-based index. `undefined` when not a number in `1..count`.
 */
export function parseMenuChoice(raw: string, count: number): number | undefined {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const choice = Number.parseInt(trimmed, 10);
  return choice >= 1 && choice <= count ? choice - 1 : undefined;
}

/**
 * Where the questions are asked and answered. The terminal, unless bound otherwise.
 */
export const PromptStreams = Symbol('PromptStreams');
export interface PromptStreams {
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
}

interface LineReader {
  readonly rl: Interface;
  readonly lines: AsyncIterableIterator<string>;
}

@injectable()
export class PromptServiceImpl implements PromptService {
  @inject(ResponseService)
  protected readonly responseService!: ResponseService;

  @inject(PromptStreams)
  protected readonly streams!: PromptStreams;

  // One reader for the whole run. Piped answers arrive in a single chunk, and a reader per question would drop the lines after the first.
  private reader: LineReader | undefined;

  async selectVariant(
    category: string,
    candidates: readonly VariantCandidate[]
  ): Promise<string | undefined> {
    this.print(`\nDevice ${category} has multiple variants, please select:\n`);
    candidates.forEach(({ id, description, flashSizes }, index) => {
      const flashInfo = flashSizes.length ? flashSizes.join(', ') : 'N/A';
      this.print(
        `  ${index + 1}. ${id.padEnd(15)} - ${
          description ?? id
        } (Flash: ${flashInfo})\n`
      );
    });
    const answer = await this.ask(`Please select (1-${candidates.length}): `);
    if (answer === undefined) {
      return undefined;
    }
    const index = parseMenuChoice(answer, candidates.length);
    if (index === undefined) {
      this.print('Invalid selection\n');
      return undefined;
    }
    return candidates[index].id;
  }

  async selectFlashRegion(): Promise<FlashRegionKey | undefined> {
    this.print('\nPlease select FLASH region:\n');
    FlashRegionKeys.forEach((key, index) => {
      const { name, startAddress } = FlashRegions[key];
      this.print(`  ${index + 1}. ${name} (${toHexAddress(startAddress)})\n`);
    });
    const answer = await this.ask(
      `Please select (1-${FlashRegionKeys.length}, Enter=${DefaultFlashRegion} region): `
    );
    if (answer === undefined) {
      return undefined;
    }
    if (!answer) {
      return DefaultFlashRegion;
    }
    const index = parseMenuChoice(answer, FlashRegionKeys.length);
    if (index === undefined) {
      this.print('Invalid selection\n');
      return undefined;
    }
    return FlashRegionKeys[index];
  }

  async selectFlashSize(
    variant: string,
    flashSizes: readonly string[]
  ): Promise<FlashSizeChoice | undefined> {
    if (!flashSizes.length) {
      return undefined;
    }
    this.print(`\nSupported FLASH sizes for device ${variant}:\n`);
    flashSizes.forEach((flashSize, index) => {
      const bytes = FlashSize.toBytes(flashSize);
      this.print(
        bytes === undefined
          ? `  ${index + 1}. ${flashSize}\n`
          : `  ${index + 1}. ${flashSize} (${bytes.toLocaleString(
              'en-US'
            )} bytes, ${toHexSize(bytes)})\n`
      );
    });
    const fullErase = flashSizes.length + 1;
    this.print(`  ${fullErase}. Full erase (entire FLASH)\n`);
    const answer = await this.ask(
      `Please select (1-${fullErase}, Enter=full erase): `
    );
    if (answer === undefined) {
      return undefined;
    }
    if (!answer) {
      return { kind: 'full' };
    }
    const index = parseMenuChoice(answer, fullErase);
    if (index === undefined) {
      this.print('Invalid selection\n');
      return undefined;
    }
    return index === flashSizes.length
      ? { kind: 'full' }
      : { kind: 'size', flashSize: flashSizes[index] };
  }

  /**
   * Trimmed answer, or `undefined` when the input has ended (Ctrl+C, end of piped input).
   */
  protected async ask(question: string): Promise<string | undefined> {
    const { lines } = this.lineReader();
    this.streams.output.write(question);
    const next = await lines.next();
    if (next.done) {
      this.print('\nOperation cancelled\n');
      return undefined;
    }
    return next.value.trim();
  }

  /**
   * Releases the input so that the process can exit.
   */
  dispose(): void {
    this.reader?.rl.close();
    this.reader = undefined;
  }

  private lineReader(): LineReader {
    if (!this.reader) {
      const rl = createInterface({
        input: this.streams.input,
        output: this.streams.output,
      });
      rl.on('SIGINT', () => rl.close());
      this.reader = { rl, lines: rl[Symbol.asyncIterator]() };
    }
    return this.reader;
  }

  protected print(chunk: string): void {
    this.responseService.appendToOutput({
      chunk,
      severity: OutputMessage.Severity.Info,
    });
  }
}
