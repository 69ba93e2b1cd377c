import { InvalidTimestampError } from "../../src/services/merge-errors";
import {
  formatTimestamp,
  isValidTimestamp,
  normalizeTimestamp,
} from "../../src/services/timestamp-util";

describe("TimestampUtil", () => {
  describe("formatTimestamp", () => {
    test("should zero-pad every component", () => {
      expect(formatTimestamp(new Date(2024, 0, 5, 3, 4, 9))).toBe(
        "05.01.2024 03:04:09"
      );
    });

    test("should use the 24-hour clock", () => {
      expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 59))).toBe(
        "31.12.2023 23:59:59"
      );
    });
  });

  describe("isValidTimestamp", () => {
    test.each([
      "01.06.2024 12:00:00",
      "29.02.2024 00:00:00",
      "31.12.1999 23:59:59",
    ])("should accept %s", (value) => {
      expect(isValidTimestamp(value)).toBe(true);
    });

    test.each([
      "",
      "2024-06-01 12:00:00",
      "1.6.2024 12:00:00",
      "01.06.2024",
      "01.06.2024 12:00",
      "29.02.2023 00:00:00",
      "31.04.2024 00:00:00",
      "00.01.2024 00:00:00",
      "01.13.2024 00:00:00",
      "01.06.2024 24:00:00",
      "01.06.2024 12:60:00",
      "01.06.2024 12:00:60",
    ])("should reject %p", (value) => {
      expect(isValidTimestamp(value)).toBe(false);
    });
  });

  describe("normalizeTimestamp", () => {
    const now = new Date(2024, 5, 1, 8, 30, 0);

    test("should use the current time for empty input", () => {
      expect(normalizeTimestamp("", now)).toBe("01.06.2024 08:30:00");
      expect(normalizeTimestamp("   ", now)).toBe("01.06.2024 08:30:00");
    });

    test("should return a valid timestamp trimmed", () => {
      expect(normalizeTimestamp(" 15.03.2024 10:11:12 ", now)).toBe(
        "15.03.2024 10:11:12"
      );
    });

    test("should throw for an invalid timestamp", () => {
      expect(() => normalizeTimestamp("yesterday", now)).toThrow(
        InvalidTimestampError
      );
    });
  });
});
