/**
 * @fileoverview OSC 1.0 message encoding for float32 argument lists.
 *
 * Layout: address string, type tag string (`,` followed by one `f` per
 * argument), then each argument as a big-endian float32. Strings are
 * null-terminated and zero-padded to a multiple of 4 bytes.
 */

export class OscEncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OscEncodingError';
  }
}

function paddedString(value: string): Buffer {
  const raw = Buffer.from(value, 'ascii');
  const size = Math.ceil((raw.length + 1) / 4) * 4;
  const padded = Buffer.alloc(size);
  raw.copy(padded);
  return padded;
}

/**
 * Encode one OSC message whose arguments are all float32.
 * @throws {OscEncodingError} if the address does not start with `/`
 */
export function encodeOscMessage(address: string, args: readonly number[]): Buffer {
  if (!address.startsWith('/')) {
    throw new OscEncodingError(`OSC address must start with '/': ${address}`);
  }

  const floats = Buffer.alloc(args.length * 4);
  args.forEach((value, index) => {
    floats.writeFloatBE(value, index * 4);
  });

  return Buffer.concat([paddedString(address), paddedString(`,${'f'.repeat(args.length)}`), floats]);
}
