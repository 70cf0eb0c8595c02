import { z } from 'zod';

const StatusResponseSchema = z.object({
  status: z
    .object({
      value: z.number(),
      description: z.string().optional(),
    })
    .passthrough(),
  response: z.array(z.number()).default([]),
});

// The property names come from the `-j` output of `blhost`.
export type BlhostStatusResponse = z.infer<typeof StatusResponseSchema>;
export namespace BlhostStatusResponse {
  export function parse(json: unknown): BlhostStatusResponse | undefined {
    const result = StatusResponseSchema.safeParse(json);
    return result.success ? result.data : undefined;
  }
  export function isSuccess(response: BlhostStatusResponse): boolean {
    return response.status.value === 0;
  }
}

const HexLine = /^[0-9a-f ]+$/i;
const HexByte = /^[0-9a-f]{2}$/i;

/**
 * Decodes the hex dump `read-memory` prints. Decoding stops at the first blank line or at a JSON document; lines that are not purely hex digits and spaces are skipped.
 */
export function decodeHexDump(output: string): Uint8Array {
  const bytes: number[] = [];
  for (const rawLine of output.trim().split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('{')) {
      break;
    }
    if (!HexLine.test(line)) {
      continue;
    }
    for (const token of line.split(/\s+/)) {
      if (HexByte.test(token)) {
        bytes.push(Number.parseInt(token, 16));
      }
    }
  }
  return Uint8Array.from(bytes);
}

const KnownErrors: ReadonlyArray<{ pattern: string; message: string }> = [
  {
    pattern: 'SpsdkNoDeviceFoundError',
    message: 'Device not found, please check connection and bootloader mode',
  },
];

/**
 * Maps well-known failures in the `blhost` error output to a hint for the user.
 */
export function knownErrorMessage(stderr: string): string | undefined {
  return KnownErrors.find(({ pattern }) => stderr.includes(pattern))?.message;
}
