export type RequestErrorKind =
  | "GetFailed"
  | "NotJson"
  | "InvalidReturn"
  | "BadResponse";

export type FindErrorKind =
  | "InvalidGroupName"
  | "InvalidTeacherName"
  | "InvalidLectureRoomName"
  | "InvalidRegexString";

export type ParseErrorKind =
  | "InvalidStringProvided"
  | "InvalidTimestampProvided";

/** Anything with `debug` and `warn`; `console` works. */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};

export class RequestError extends Error {
  readonly kind: RequestErrorKind;
  /** HTTP status, set for `BadResponse`. */
  readonly status?: number;
  /** HTTP reason phrase, set for `BadResponse`. */
  readonly reason?: string;

  constructor(
    kind: RequestErrorKind,
    message: string,
    opts?: { status?: number; reason?: string; cause?: unknown },
  ) {
    super(message, { cause: opts?.cause });
    this.name = "RequestError";
    this.kind = kind;
    this.status = opts?.status;
    this.reason = opts?.reason;
  }

  static getFailed(cause: unknown): RequestError {
    return new RequestError("GetFailed", "Can't get any response", { cause });
  }

  static notJson(cause: unknown): RequestError {
    return new RequestError("NotJson", "Got response not in JSON format", {
      cause,
    });
  }

  static invalidReturn(): RequestError {
    return new RequestError(
      "InvalidReturn",
      "API returned data in unexpected format",
    );
  }

  static badResponse(reason: string, status: number): RequestError {
    return new RequestError(
      "BadResponse",
      `API returned with status code: ${status} - ${reason}`,
      { status, reason },
    );
  }
}

const FIND_MESSAGES: Record<FindErrorKind, string> = {
  InvalidGroupName: "Can't find group with name",
  InvalidTeacherName: "Can't find teacher with name",
  InvalidLectureRoomName: "Can't find lecture room with name",
  InvalidRegexString: "Can't compile RegExp from given string",
};

export class FindError extends Error {
  readonly kind: FindErrorKind;
  /** The search term as the caller passed it. */
  readonly input: string;

  constructor(kind: FindErrorKind, input: string, opts?: { cause?: unknown }) {
    super(`${FIND_MESSAGES[kind]}: ${input}`, { cause: opts?.cause });
    this.name = "FindError";
    this.kind = kind;
    this.input = input;
  }
}

export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly input: string;

  constructor(kind: ParseErrorKind, input: string) {
    const source = kind === "InvalidTimestampProvided" ? "timestamp" : "string";
    super(`Can't parse DateTime from ${source}: ${input}`);
    this.name = "ParseError";
    this.kind = kind;
    this.input = input;
  }
}
