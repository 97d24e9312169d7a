import { describe, it, expect } from "vitest";
import {
  classifyDocument,
  getExtension,
  isSummaryArtifact,
  toSummaryKey,
} from "./documentFormat.js";
import { UnsupportedFormatError } from "./errors.js";

describe("documentFormat", () => {
  describe("classifyDocument", () => {
    it.each([
      ["report.pdf", "multiPage"],
      ["scan.png", "image"],
      ["photo.jpeg", "image"],
      ["photo.jpg", "image"],
      ["fax.tiff", "image"],
      ["folder/REPORT.PDF", "multiPage"],
      ["Scan.PNG", "image"],
    ])("classifies %s as %s", (key, format) => {
      expect(classifyDocument(key)).toBe(format);
    });

    it.each(["notes.docx", "data.csv", "summary.txt", "image.gif", "README", "folder.pdf/file"])(
      "rejects %s",
      (key) => {
        expect(() => classifyDocument(key)).toThrow(UnsupportedFormatError);
      }
    );

    it("reports the rejected extension", () => {
      expect(() => classifyDocument("notes.docx")).toThrow(
        'Unsupported document format ".docx" for key notes.docx'
      );
    });
  });

  describe("getExtension", () => {
    it("returns the lowercased final extension", () => {
      expect(getExtension("a/b/archive.v2.TIFF")).toBe(".tiff");
    });

    it("ignores dots in folder names and leading dots", () => {
      expect(getExtension("v1.2/notes")).toBe("");
      expect(getExtension("folder/.hidden")).toBe("");
    });
  });

  describe("toSummaryKey", () => {
    it("replaces the final extension with the summary suffix", () => {
      expect(toSummaryKey("reports/q3.pdf")).toBe("reports/q3-summary.txt");
      expect(toSummaryKey("Scan.PNG")).toBe("Scan-summary.txt");
      expect(toSummaryKey("archive.v2.tiff")).toBe("archive.v2-summary.txt");
    });

    it("appends the suffix when there is no extension", () => {
      expect(toSummaryKey("dir.v1/file")).toBe("dir.v1/file-summary.txt");
    });
  });

  describe("isSummaryArtifact", () => {
    it("recognizes keys ending in the summary suffix", () => {
      expect(isSummaryArtifact("reports/q3-summary.txt")).toBe(true);
      expect(isSummaryArtifact("REPORT-SUMMARY.TXT")).toBe(true);
    });

    it("does not match other keys", () => {
      expect(isSummaryArtifact("reports/summary.txt")).toBe(false);
      expect(isSummaryArtifact("reports/q3-summary.pdf")).toBe(false);
    });
  });
});
