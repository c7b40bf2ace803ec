import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../../src/errors";
import { validateYear } from "../../src/utils/year";

const NOW = new Date(2026, 5, 15);

describe("validateYear", () => {
  it("accepts every year from 2006 through the current year", () => {
    for (let year = 2006; year <= 2026; year++) {
      expect(validateYear(String(year), NOW)).toBe(String(year));
    }
  });

  it("returns the bare four-digit form", () => {
    expect(validateYear(" 2021 ", NOW)).toBe("2021");
    expect(validateYear("+2021", NOW)).toBe("2021");
  });

  it.each(["2005", "2027", "0", "-2021"])("rejects out-of-range year %s", (input) => {
    expect(() => validateYear(input, NOW)).toThrow(
      "Year must be between 2006 and 2026."
    );
  });

  it.each(["abc", "", "2021.0", "20 21", "2021a", "0x7E5"])(
    "rejects non-numeric input %j",
    (input) => {
      expect(() => validateYear(input, NOW)).toThrow(InvalidInputError);
      expect(() => validateYear(input, NOW)).toThrow(
        `${input} is not a valid year.`
      );
    }
  );
});
