export type DecodeErrorKind = "missing_field" | "unrecognized_code" | "out_of_range";

/** A problem with one message; the stream it came from carries on. */
export class DecodeError extends Error {
  constructor(
    readonly kind: DecodeErrorKind,
    message: string
  ) {
    super(message);
    this.name = "DecodeError";
  }
}
