import { ValidationError } from "../../errors/errors";
import { calculateAgeDays, describeAge, formatDateLabel, parseDateLabel } from "../age-calculator";
import { sanitizeLabel, sanitizeSecretName, secretNameForEnvironment } from "../sanitize";
import { protoTimestampToDate } from "../timestamp";

describe("sanitize", () => {
  it("should replace characters Secret Manager rejects", () => {
    expect(sanitizeSecretName("dev/sql password")).toBe("dev-sql-password");
  });

  it("should cap secret names at 255 characters", () => {
    expect(sanitizeSecretName("a".repeat(300))).toHaveLength(255);
  });

  it("should reject names that sanitize to nothing", () => {
    expect(() => sanitizeSecretName("///")).toThrow(ValidationError);
  });

  it("should lowercase label values", () => {
    expect(sanitizeLabel("Dev Env!")).toBe("dev-env");
  });

  it("should derive the per-environment secret name", () => {
    expect(secretNameForEnvironment("prod")).toBe("prod-sql-password");
  });
});

describe("age-calculator", () => {
  const start = new Date("2024-01-01T00:00:00Z");

  it("should count whole days", () => {
    expect(calculateAgeDays(start, new Date("2024-01-11T12:00:00Z"))).toBe(10);
  });

  it("should describe ages", () => {
    expect(describeAge(start, new Date("2024-01-01T18:00:00Z"))).toBe("today");
    expect(describeAge(start, new Date("2024-01-02T00:00:00Z"))).toBe("1 day ago");
    expect(describeAge(start, new Date("2024-01-11T00:00:00Z"))).toBe("10 days ago");
  });

  it("should format and parse label dates", () => {
    const label = formatDateLabel(new Date("2024-01-15T12:30:45.123Z"));

    expect(label).toBe("2024-01-15-12-30-45");
    expect(parseDateLabel(label)).toEqual(new Date("2024-01-15T12:30:45Z"));
  });

  it("should return undefined for labels that do not parse", () => {
    expect(parseDateLabel("not-a-date")).toBeUndefined();
  });
});

describe("protoTimestampToDate", () => {
  it("should map a missing timestamp to the epoch", () => {
    expect(protoTimestampToDate(undefined)).toEqual(new Date(0));
  });

  it("should accept Long-like seconds", () => {
    expect(protoTimestampToDate({ seconds: { toString: () => "1700000000" }, nanos: 999_999 })).toEqual(
      new Date(1_700_000_000_000)
    );
  });
});
