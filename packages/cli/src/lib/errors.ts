export type MsgportErrorCode = "PARSE_ERROR" | "MISSING_PHONE" | "UNSUPPORTED_FORMAT" | "USAGE"

export class MsgportError extends Error {
  readonly code: MsgportErrorCode

  constructor(code: MsgportErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** Input that does not match the schema its reader expects. */
export class ParseError extends MsgportError {
  readonly source?: string
  readonly detail: string

  constructor(detail: string, source?: string, options?: ErrorOptions) {
    super("PARSE_ERROR", source ? `${source}: ${detail}` : detail, options)
    this.detail = detail
    if (source) {
      this.source = source
    }
  }

  withSource(source: string): ParseError {
    if (this.source) {
      return this
    }

    return new ParseError(this.detail, source, { cause: this })
  }
}

export class MissingPhoneError extends MsgportError {
  constructor(message = "Writing outgoing MMS messages in Android format requires your phone number (--phone).") {
    super("MISSING_PHONE", message)
  }
}

export class UnsupportedFormatError extends MsgportError {
  readonly format: string

  constructor(format: string, supported: readonly string[]) {
    super("UNSUPPORTED_FORMAT", `Unsupported format '${format}'. Expected one of: ${supported.join(", ")}.`)
    this.format = format
  }
}

export class UsageError extends MsgportError {
  constructor(message: string) {
    super("USAGE", message)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
