import { FormatError } from '../errors';
import type { SourceKind } from '../types/table';

const decoder = new TextDecoder('utf-8', { fatal: true });

export const decodeUtf8 = (bytes: Uint8Array, kind: SourceKind, source: string) => {
  try {
    return decoder.decode(bytes);
  } catch (err) {
    throw new FormatError(kind, source, 'bytes are not valid UTF-8', { cause: err });
  }
};
