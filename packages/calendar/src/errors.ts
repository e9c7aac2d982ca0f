export class TimestampOverflowError extends RangeError {
  public override readonly name = "TimestampOverflowError";
}
