export type ErrnoException = Error & { code: string; errno: number };
export namespace ErrnoException {
  export function is(arg: unknown): arg is ErrnoException {
    return (
      arg instanceof Error &&
      'code' in arg &&
      'errno' in arg &&
      typeof arg.code === 'string' &&
      typeof arg.errno === 'number'
    );
  }

  /**
   * (No such file or directory): Commonly raised by `fs` operations to indicate that a component of the specified pathname does not exist.
   */
  export function isENOENT(
    arg: unknown
  ): arg is ErrnoException & { code: 'ENOENT' } {
    return is(arg) && arg.code === 'ENOENT';
  }
}
