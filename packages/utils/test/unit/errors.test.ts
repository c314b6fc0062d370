import {describe, it, expect} from "vitest";
import {WardenError, toError} from "../../src/index.js";

enum SampleErrorCode {
  FIRST = "SAMPLE_ERROR_FIRST",
}

type SampleErrorType = {code: SampleErrorCode.FIRST; epoch: number};

class SampleError extends WardenError<SampleErrorType> {}

describe("errors", () => {
  it("should use the code as default message", () => {
    const error = new SampleError({code: SampleErrorCode.FIRST, epoch: 3});
    expect(error.message).toBe("SAMPLE_ERROR_FIRST");
    expect(error.type.epoch).toBe(3);
    expect(error).toBeInstanceOf(Error);
  });

  it("should include metadata and stack in toObject", () => {
    const error = new SampleError({code: SampleErrorCode.FIRST, epoch: 3}, "custom");
    error.stack = "$STACK";
    expect(error.message).toBe("custom");
    expect(error.toObject()).toEqual({code: "SAMPLE_ERROR_FIRST", epoch: 3, stack: "$STACK"});
  });

  it("should wrap non Error values", () => {
    const error = new Error("a");
    expect(toError(error)).toBe(error);
    expect(toError("b").message).toBe("b");
  });
});
