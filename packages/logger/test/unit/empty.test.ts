import {describe, it, expect} from "vitest";
import {getEmptyLogger} from "../../src/index.js";

describe("empty logger", () => {
  it("should return itself as child", () => {
    const logger = getEmptyLogger();
    expect(logger.child({module: "any"})).toBe(logger);
    expect(() => logger.error("nothing", {slot: 1})).not.toThrow();
  });
});
