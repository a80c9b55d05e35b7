import { Schema } from "effect";

export class OutOfRangeError extends Schema.TaggedError<OutOfRangeError>(
  "@treasure/core/OutOfRangeError",
)("OutOfRangeError", {
  slot: Schema.Number,
  min: Schema.Number,
  max: Schema.Number,
}) {
  override get message(): string {
    return `Slot ${this.slot} is outside ${this.min}..${this.max}`;
  }
}

export class InvalidItemError extends Schema.TaggedError<InvalidItemError>(
  "@treasure/core/InvalidItemError",
)("InvalidItemError", {
  input: Schema.String,
  min: Schema.Number,
  max: Schema.Number,
}) {
  override get message(): string {
    return `Item must be a whole number from ${this.min} to ${this.max} (got "${this.input}")`;
  }
}
