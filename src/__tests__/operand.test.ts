import { describe, it, expect } from "vitest";
import { parseOperand } from "../lib/operand.js";
import { makeDuration } from "../types.js";

const now = new Date(2026, 1, 15, 14, 30, 5);

function errorKind(text: string): string {
  const result = parseOperand(text, now);
  if (result.ok) throw new Error(`expected ${text} to fail`);
  return result.error.kind;
}

describe("parseOperand", () => {
  it("recognizes keywords first", () => {
    expect(parseOperand("  today ", now)).toEqual({
      ok: true,
      value: { kind: "instant", year: 2026, month: 2, day: 15 },
    });
  });

  it("recognizes durations", () => {
    expect(parseOperand("2 days", now)).toEqual({
      ok: true,
      value: makeDuration({ days: 2 }),
    });
  });

  it("recognizes datetimes", () => {
    const result = parseOperand("06/10/24 15:33", now);
    if (!result.ok) throw new Error("expected success");
    expect(result.value).toEqual({
      kind: "instant",
      year: 2024,
      month: 6,
      day: 10,
      time: { hour: 15, minute: 33, second: 0 },
    });
  });

  it("reports invalid date values for date-shaped text", () => {
    expect(errorKind("2024-02-30")).toBe("InvalidDateValue");
    expect(errorKind("13/45/2024")).toBe("InvalidDateValue");
  });

  it("reports invalid date formats for date-shaped text", () => {
    expect(errorKind("Foo/1/2023")).toBe("InvalidDateFormat");
    expect(errorKind("2024-07-10 junk")).toBe("InvalidDateFormat");
  });

  it("reports duration token errors once a pair was read", () => {
    expect(errorKind("1d xyz")).toBe("InvalidDurationToken");
    expect(errorKind("5 fortnights")).toBe("InvalidDurationToken");
  });

  it("reports anything else as unrecognized", () => {
    expect(errorKind("hello")).toBe("UnrecognizedOperand");
    expect(errorKind("2024")).toBe("UnrecognizedOperand");
  });
});
