/**
 * Error carrying a numeric `code` and structured `data`, so that callers can
 * branch on the failure kind instead of parsing messages.
 */
export class ApplicationError<C extends number, D> extends Error {
  constructor(
    readonly code: C,
    message: string,
    readonly data: D
  ) {
    super(message);
    this.name = 'ApplicationError';
  }
}

export namespace ApplicationError {
  export interface Literal<D> {
    readonly message: string;
    readonly data: D;
  }

  export interface Constructor<C extends number, D, A extends unknown[]> {
    (...args: A): ApplicationError<C, D>;
    readonly code: C;
    is(error: unknown): error is ApplicationError<C, D>;
  }

  export function declare<C extends number, D, A extends unknown[]>(
    code: C,
    factory: (...args: A) => Literal<D>
  ): Constructor<C, D, A> {
    const create = (...args: A): ApplicationError<C, D> => {
      const { message, data } = factory(...args);
      return new ApplicationError(code, message, data);
    };
    return Object.assign(create, {
      code,
      is: (error: unknown): error is ApplicationError<C, D> =>
        error instanceof ApplicationError && error.code === code,
    });
  }

  export function is(
    error: unknown
  ): error is ApplicationError<number, unknown> {
    return error instanceof ApplicationError;
  }
}
