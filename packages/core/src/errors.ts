export { TimestampOverflowError } from "@reltime/calendar";

export class NullInputError extends TypeError {
  public override readonly name = "NullInputError";

  public constructor(param = "input") {
    super(`${param} must not be null or undefined`);
  }
}

export class FormatError extends Error {
  public override readonly name = "FormatError";
}

export class LocaleResourceError extends Error {
  public override readonly name = "LocaleResourceError";
}
