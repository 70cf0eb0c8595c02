import chalk from 'chalk';
import { injectable } from 'inversify';
import {
  OutputMessage,
  ProgressMessage,
  ResponseService,
} from '../common/protocol';

/**
 * Writes output chunks to the terminal as they arrive. Errors go to stderr.
 */
@injectable()
export class ConsoleResponseService implements ResponseService {
  appendToOutput(message: OutputMessage): void {
    const { chunk, severity = OutputMessage.Severity.Info } = message;
    switch (severity) {
      case OutputMessage.Severity.Error:
        process.stderr.write(chalk.red(chunk));
        break;
      case OutputMessage.Severity.Warning:
        process.stdout.write(chalk.yellow(chunk));
        break;
      case OutputMessage.Severity.Success:
        process.stdout.write(chalk.green(chunk));
        break;
      case OutputMessage.Severity.Info:
        process.stdout.write(chunk);
        break;
    }
  }

  reportProgress({ message }: ProgressMessage): void {
    process.stdout.write(chalk.cyan(message) + '\n');
  }
}
