import {describe, it, expect} from "vitest";
import {toHex} from "../../src/index.js";

describe("bytes utils", () => {
  describe("toHex", () => {
    it("should render a 0x prefixed lowercase hex string", () => {
      expect(toHex(Uint8Array.from([0, 1, 255]))).toBe("0x0001ff");
    });

    it("should render empty bytes as the bare prefix", () => {
      expect(toHex(new Uint8Array(0))).toBe("0x");
    });

    it("should give the same string for a Buffer and a Uint8Array", () => {
      expect(toHex(Buffer.from([0xab, 0x0c]))).toBe(toHex(Uint8Array.from([0xab, 0x0c])));
    });
  });
});
