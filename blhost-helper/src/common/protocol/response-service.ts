export interface OutputMessage {
  readonly chunk: string;
  readonly severity?: OutputMessage.Severity;
}
export namespace OutputMessage {
  export enum Severity {
    Error = 'error',
    Warning = 'warning',
    Info = 'info',
    Success = 'success',
  }
}

export interface ProgressMessage {
  readonly message: string;
  readonly work?: ProgressMessage.Work;
}
export namespace ProgressMessage {
  export interface Work {
    readonly done: number;
    readonly total: number;
  }
}

export const ResponseService = Symbol('ResponseService');
export interface ResponseService {
  appendToOutput(message: OutputMessage): void;
  reportProgress(message: ProgressMessage): void;
}
