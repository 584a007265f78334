/**
 * Firmware signing error taxonomy.
 *
 * Every code is a deterministic, non-transient failure tied to bad input:
 * callers surface it and never retry. File I/O failures live in FsError and
 * are never folded into these.
 */

export type KeyError =
  | { readonly code: 'KEY_INVALID_LENGTH'; readonly message: string; readonly actualLength: number }
  | { readonly code: 'KEY_INVALID_ENCODING'; readonly message: string };

export type EntropyError = { readonly code: 'ENTROPY_UNAVAILABLE'; readonly message: string };

export type EnvelopeTooShortError = {
  readonly code: 'ENVELOPE_TOO_SHORT';
  readonly message: string;
  readonly actualLength: number;
};

export type SignatureInvalidError = { readonly code: 'SIGNATURE_INVALID'; readonly message: string };

export type VerifyError = KeyError | EnvelopeTooShortError | SignatureInvalidError;

export type ChunkError =
  | { readonly code: 'CHUNK_INVALID_SIZE'; readonly message: string }
  | { readonly code: 'CHUNK_OVERRUN'; readonly message: string; readonly declaredSize: number }
  | { readonly code: 'CHUNK_INCOMPLETE'; readonly message: string; readonly received: number; readonly declaredSize: number }
  | { readonly code: 'CHUNK_FINISHED'; readonly message: string };

export type ChunkedVerifyError = VerifyError | ChunkError;
