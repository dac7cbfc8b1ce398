import { formatClock, formatDateTime, formatRow } from "../../packages/ui/src/format";

function local(year: number, month: number, day: number, hours: number, minutes: number, seconds: number): string {
  return new Date(year, month, day, hours, minutes, seconds).toISOString();
}

describe("timestamp formatting", () => {
  test("formats local clock time", () => {
    expect(formatClock(local(2024, 0, 2, 3, 4, 5))).toBe("03:04:05");
  });

  test("formats local date and time", () => {
    expect(formatDateTime(local(2024, 10, 22, 13, 45, 9))).toBe("2024-11-22 13:45:09");
  });

  test("shows unparsable timestamps as stored", () => {
    expect(formatClock("yesterday")).toBe("yesterday");
    expect(formatDateTime("yesterday")).toBe("yesterday");
  });
});

describe("formatRow", () => {
  test("puts the clock before a single-line preview", () => {
    expect(formatRow({ content: "a\n b", timestamp: local(2024, 0, 2, 23, 59, 58), preview: "a\n b" })).toBe(
      "[23:59:58] a b"
    );
  });
});
