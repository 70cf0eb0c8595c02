import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';

export interface ParsedJsonc {
  readonly value: unknown;
  /**
   * `<error code> at <offset>` for each syntax error. The value must not be used when this is non-empty.
   */
  readonly errors: readonly string[];
}

export function parseJsonc(text: string): ParsedJsonc {
  const errors: ParseError[] = [];
  const value: unknown = parse(text, errors, {
    allowEmptyContent: true,
    allowTrailingComma: true,
    disallowComments: false,
  });
  return {
    value,
    errors: errors.map(
      ({ error, offset }) => `${printParseErrorCode(error)} at ${offset}`
    ),
  };
}
