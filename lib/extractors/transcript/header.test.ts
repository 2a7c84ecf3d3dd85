import { describe, expect, it } from "vitest";
import { extractAcademicYear, extractParcoursInfo, normalizeAcademicYear } from "./header";

const PLACEHOLDERS = { track: "UNKNOWN", academicYear: "UNKNOWN", semester: "UNKNOWN" };

describe("normalizeAcademicYear", () => {
  it("widens a two-digit end year", () => {
    expect(normalizeAcademicYear("2022", "23")).toBe("2022-2023");
  });

  it("keeps a four-digit end year", () => {
    expect(normalizeAcademicYear("2022", "2023")).toBe("2022-2023");
  });
});

describe("extractAcademicYear", () => {
  it("reads the full form", () => {
    expect(extractAcademicYear("Université Savoie Mont Blanc Année universitaire 2022/2023")).toBe("2022-2023");
  });

  it("accepts a colon after the label", () => {
    expect(extractAcademicYear("Année universitaire : 2021 / 2022")).toBe("2021-2022");
  });

  it("falls back to the session line", () => {
    expect(extractAcademicYear("Relevé de notes\nSession S1 2022/23")).toBe("2022-2023");
  });

  it("prefers the full form over the session line", () => {
    expect(extractAcademicYear("Session S2 2021/22\nAnnée universitaire 2022/2023")).toBe("2022-2023");
  });

  it("returns null without either form", () => {
    expect(extractAcademicYear("Relevé de notes")).toBeNull();
  });
});

describe("extractParcoursInfo", () => {
  it("takes track and semester from the first enrollment line", () => {
    const text = [
      "Année universitaire 2022/2023",
      "inscrit en Semestre 7 M1-API",
      "inscrite en Semestre 9 M2-XYZ",
    ].join("\n");
    const result = extractParcoursInfo(text, PLACEHOLDERS);
    expect(result.parcours).toEqual({ track: "M1-API", semester: "7", academicYear: "2022-2023" });
    expect(result.defaultedFields).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("defaults every missing field and says so", () => {
    const result = extractParcoursInfo("Relevé de notes", PLACEHOLDERS);
    expect(result.parcours).toEqual({ track: "UNKNOWN", semester: "UNKNOWN", academicYear: "UNKNOWN" });
    expect(result.defaultedFields).toEqual(["track", "semester", "academicYear"]);
    expect(result.warnings).toEqual([
      'track: not detected, using "UNKNOWN"',
      'semester: not detected, using "UNKNOWN"',
      'academicYear: not detected, using "UNKNOWN"',
    ]);
  });

  it("uses the configured placeholders", () => {
    const result = extractParcoursInfo("inscrite en Semestre 5 L3-INFO", {
      track: "?",
      academicYear: "n/a",
      semester: "?",
    });
    expect(result.parcours).toEqual({ track: "L3-INFO", semester: "5", academicYear: "n/a" });
    expect(result.defaultedFields).toEqual(["academicYear"]);
  });
});
