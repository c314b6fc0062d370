import {describe, it, expect} from "vitest";
import {WEAK_SUBJECTIVITY_PERIOD} from "@warden/params";
import {
  MAX_EPOCH_HISTORY_PERIOD,
  OptionsError,
  OptionsErrorCode,
  defaultOptions,
  parseValidatorOptions,
} from "../../src/index.js";

describe("parseValidatorOptions", () => {
  it("should fill every option with its default", () => {
    expect(parseValidatorOptions()).toEqual({
      protectAttester: true,
      attestationMode: "conflicting",
      weakSubjectivityPeriod: WEAK_SUBJECTIVITY_PERIOD,
      dbPath: "./validator-db",
      logFile: null,
      logFileDailyRotate: 5,
    });
    expect(parseValidatorOptions({})).toEqual(defaultOptions);
  });

  it("should keep given options", () => {
    expect(
      parseValidatorOptions({protectAttester: false, attestationMode: "single", weakSubjectivityPeriod: 16})
    ).toEqual({
      protectAttester: false,
      attestationMode: "single",
      weakSubjectivityPeriod: 16,
      dbPath: "./validator-db",
      logFile: null,
      logFileDailyRotate: 5,
    });
  });

  for (const period of [0, -1, 1.5, MAX_EPOCH_HISTORY_PERIOD + 1, NaN]) {
    it(`should reject period ${period}`, () => {
      expect(() => parseValidatorOptions({weakSubjectivityPeriod: period})).toThrow(OptionsError);
    });
  }

  it("should accept the largest period", () => {
    expect(parseValidatorOptions({weakSubjectivityPeriod: MAX_EPOCH_HISTORY_PERIOD}).weakSubjectivityPeriod).toBe(
      MAX_EPOCH_HISTORY_PERIOD
    );
  });

  it("should reject an unknown attestation mode", () => {
    // As read from a config file
    const opts = JSON.parse('{"attestationMode": "double"}');
    expect(() => parseValidatorOptions(opts)).toThrow(OptionsErrorCode.INVALID_ATTESTATION_MODE);
  });

  it("should accept a log file without rotation", () => {
    expect(parseValidatorOptions({logFile: "validator.log", logFileDailyRotate: 0})).toMatchObject({
      logFile: "validator.log",
      logFileDailyRotate: 0,
    });
  });

  for (const dailyRotate of [-1, 2.5]) {
    it(`should reject ${dailyRotate} daily log files`, () => {
      expect(() => parseValidatorOptions({logFileDailyRotate: dailyRotate})).toThrow(
        OptionsErrorCode.INVALID_LOG_FILE_DAILY_ROTATE
      );
    });
  }
});
