import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ExportError, ReportWriteError, ScoringError, UserInputError } from "../src/core/errors.js";
import { scriptedOutcomeSource, seededOutcomeSource } from "../src/core/outcomes.js";
import { STANDARD_CRITERIA } from "../src/core/quality.js";
import { AnnotationSession, type AnnotationSessionOptions } from "../src/core/session.js";
import type { SessionLogger } from "../src/core/session-logger.js";

const FIXED_TIME = "2026-01-15T10:00:00.000Z";

interface RecordedLine {
  level: keyof SessionLogger;
  message: string;
}

function createSession(options: AnnotationSessionOptions = {}): { session: AnnotationSession; lines: RecordedLine[] } {
  const lines: RecordedLine[] = [];
  const logger: SessionLogger = {
    info: (message) => lines.push({ level: "info", message }),
    success: (message) => lines.push({ level: "success", message }),
    warn: (message) => lines.push({ level: "warn", message })
  };
  const session = new AnnotationSession({
    clock: () => new Date(FIXED_TIME),
    logger,
    outcomes: scriptedOutcomeSource(["A"]),
    ...options
  });
  return { session, lines };
}

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), "annotation-ledger-session-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe("AnnotationSession.annotate", () => {
  it("appends records in call order and returns each one", () => {
    const { session, lines } = createSession();
    const ids = ["IMG_001", "IMG_002", "IMG_003", "IMG_004"];
    const created = ids.map((id, index) => session.annotate(id, "vehicle", index + 1));

    expect(session.annotations).toHaveLength(4);
    expect(session.annotations.map((annotation) => annotation.image_id)).toEqual(ids);
    expect(session.annotations[2]).toBe(created[2]);
    expect(lines[0]).toEqual({ level: "success", message: "Annotated image IMG_001 as 'vehicle' (confidence: 1/5)" });
  });

  it("stamps the clock time, defaults notes and keeps key order", () => {
    const { session } = createSession();
    const annotation = session.annotate("IMG_010", "animal", 4);
    expect(annotation).toEqual({
      image_id: "IMG_010",
      category: "animal",
      confidence: 4,
      timestamp: FIXED_TIME,
      notes: ""
    });
    expect(Object.keys(annotation)).toEqual(["image_id", "category", "confidence", "timestamp", "notes"]);
    expect(Object.isFrozen(annotation)).toBe(true);
  });

  it("accepts out-of-range confidence by default", () => {
    const { session } = createSession();
    const annotation = session.annotate("IMG_011", "", 9);
    expect(annotation.confidence).toBe(9);
    expect(session.annotations).toHaveLength(1);
  });

  it("rejects out-of-range confidence in strict mode without appending", () => {
    const { session } = createSession({ strict: true });
    expect(() => session.annotate("IMG_012", "animal", 9)).toThrow(UserInputError);
    expect(() => session.annotate("IMG_013", " ", 3)).toThrow("category must not be empty");
    expect(session.annotations).toHaveLength(0);
    session.annotate("IMG_014", "animal", 3);
    expect(session.annotations).toHaveLength(1);
  });
});

describe("AnnotationSession.qualityCheck", () => {
  it("scores a well-formed annotation 3/3", () => {
    const { session, lines } = createSession();
    const annotation = session.annotate("IMG_001", "vehicle", 5, "Clear image of a car");
    const result = session.qualityCheck(annotation, STANDARD_CRITERIA);

    expect(result.score).toBe(3);
    expect(result.max_score).toBe(3);
    expect(result.percentage).toBe(100);
    expect(result.feedback).toEqual(["✓ Complete", "✓ Correct format", "✓ Consistent"]);
    expect(result.timestamp).toBe(FIXED_TIME);
    expect(result.data_entry).toEqual(annotation);
    expect(session.qualityScores).toEqual([result]);
    expect(lines.at(-1)).toEqual({ level: "info", message: "Quality score: 3/3 (100.0%)" });
  });

  it("marks completeness failed for an annotation without notes", () => {
    const { session } = createSession();
    const annotation = session.annotate("IMG_002", "person", 4);
    const result = session.qualityCheck(annotation, STANDARD_CRITERIA);

    expect(result.score).toBe(2);
    expect(result.feedback[0]).toBe("✗ Missing data");
    expect(result.percentage).toBeCloseTo(66.67, 2);
  });

  it("copies the entry so later changes do not leak into the log", () => {
    const { session } = createSession();
    const entry: Record<string, unknown> = { image_id: "IMG_003", confidence: 2 };
    const result = session.qualityCheck(entry, ["format"]);
    entry["image_id"] = 7;
    expect(result.data_entry["image_id"]).toBe("IMG_003");
  });

  it("understates the percentage when criteria are unknown (known quirk)", () => {
    const { session } = createSession();
    const annotation = session.annotate("IMG_004", "building", 4, "Office building");
    const result = session.qualityCheck(annotation, ["completeness", "format", "consistency", "sharpness"]);
    expect(result.score).toBe(3);
    expect(result.max_score).toBe(4);
    expect(result.percentage).toBe(75);
  });

  it("surfaces the empty-criteria failure and records nothing", () => {
    const { session } = createSession();
    const annotation = session.annotate("IMG_005", "vehicle", 5, "Truck");
    expect(() => session.qualityCheck(annotation, [])).toThrow(ScoringError);
    expect(session.qualityScores).toHaveLength(0);
  });
});

describe("AnnotationSession.compare", () => {
  it("records the injected winner", () => {
    const { session, lines } = createSession({ outcomes: scriptedOutcomeSource(["B", "Tie"]) });
    const first = session.compare("detailed notes", "minimal notes", "completeness");
    const second = session.compare({ id: 1 }, { id: 2 }, "reliability");

    expect(first).toEqual({
      item_a: "detailed notes",
      item_b: "minimal notes",
      criterion: "completeness",
      winner: "B",
      timestamp: FIXED_TIME
    });
    expect(second.winner).toBe("Tie");
    expect(session.comparisons).toHaveLength(2);
    expect(lines[0]?.message).toBe(
      [
        "Pairwise comparison: completeness",
        "Item A: detailed notes",
        "Item B: minimal notes",
        "Result: Item B is better for 'completeness'"
      ].join("\n")
    );
    expect(lines[1]?.message).toContain('Item A: {"id":1}');
  });

  it("reproduces winners for the same seed", () => {
    const left = createSession({ outcomes: seededOutcomeSource(7) }).session;
    const right = createSession({ outcomes: seededOutcomeSource(7) }).session;
    const leftWinners = Array.from({ length: 10 }, (_, index) => left.compare(index, index + 1, "quality").winner);
    const rightWinners = Array.from({ length: 10 }, (_, index) => right.compare(index, index + 1, "quality").winner);
    expect(leftWinners).toEqual(rightWinners);
  });
});

describe("AnnotationSession.consistencyReport", () => {
  it("returns null and warns with a single annotation", () => {
    const { session, lines } = createSession();
    session.annotate("IMG_001", "A", 3);
    expect(session.consistencyReport()).toBeNull();
    expect(lines.at(-1)).toEqual({ level: "warn", message: "Need at least 2 annotations for a consistency report." });
  });

  it("reports diversity for categories [A, A, B]", () => {
    const { session } = createSession();
    session.annotate("IMG_001", "A", 5);
    session.annotate("IMG_002", "A", 4);
    session.annotate("IMG_003", "B", 3);
    const report = session.consistencyReport();
    expect(report?.uniqueCategories).toBe(2);
    expect(report?.totalAnnotations).toBe(3);
    expect(report?.consistencyScore).toBeCloseTo(66.67, 2);
  });
});

describe("AnnotationSession exports", () => {
  it("writes a JSON report whose counts match the live logs", () => {
    const dir = makeTempDir();
    const { session } = createSession();
    const first = session.annotate("IMG_001", "vehicle", 5, "Car");
    session.annotate("IMG_002", "person", 4);
    session.qualityCheck(first, STANDARD_CRITERIA);
    session.compare("a", "b", "quality");

    const path = join(dir, "report.json");
    const report = session.generateReport(path);
    const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));

    expect(parsed).toEqual(report);
    expect(report.summary).toEqual({
      totalAnnotations: 2,
      totalQualityChecks: 1,
      totalComparisons: 1,
      generatedAt: FIXED_TIME,
      averageQualityScore: "100.00%"
    });
    expect(report.annotations).not.toBe(session.annotations);
  });

  it("keeps the report independent of later appends", () => {
    const dir = makeTempDir();
    const { session } = createSession();
    session.annotate("IMG_001", "vehicle", 5, "Car");
    const report = session.generateReport(join(dir, "report.json"));
    session.annotate("IMG_002", "person", 4);
    expect(report.annotations).toHaveLength(1);
    expect(report.summary.totalAnnotations).toBe(1);
  });

  it("returns the built report on the error when the write fails", () => {
    const dir = makeTempDir();
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "not a directory");
    const { session } = createSession();
    session.annotate("IMG_001", "vehicle", 5, "Car");

    let caught: unknown;
    try {
      session.generateReport(join(blocker, "report.json"));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ReportWriteError);
    expect(caught).toBeInstanceOf(ExportError);
    if (caught instanceof ReportWriteError) {
      expect(caught.report.summary.totalAnnotations).toBe(1);
      expect(caught.exitCode).toBe(1);
    }
    expect(session.annotations).toHaveLength(1);
  });

  it("throws an export error when the CSV write fails and keeps the log", () => {
    const dir = makeTempDir();
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "not a directory");
    const { session } = createSession();
    session.annotate("IMG_001", "vehicle", 5, "Car");
    session.annotate("IMG_002", "person", 4, "Walking");

    expect(() => session.exportCsv(join(blocker, "annotations.csv"))).toThrow(ExportError);
    expect(session.annotations).toHaveLength(2);
    expect(existsSync(join(blocker, "annotations.csv"))).toBe(false);
  });

  it("writes one CSV row per annotation under the record keys", () => {
    const dir = makeTempDir();
    const { session } = createSession();
    session.annotate("IMG_001", "vehicle", 5, "Clear image of a car");
    session.annotate("IMG_004", "building", 4, "Office building, slight blur");

    const path = join(dir, "annotations.csv");
    expect(session.exportCsv(path)).toBe(path);
    expect(readFileSync(path, "utf8")).toBe(
      [
        "image_id,category,confidence,timestamp,notes",
        `IMG_001,vehicle,5,${FIXED_TIME},Clear image of a car`,
        `IMG_004,building,4,${FIXED_TIME},"Office building, slight blur"`,
        ""
      ].join("\r\n")
    );
  });

  it("skips the CSV write when there are no annotations", () => {
    const dir = makeTempDir();
    const { session, lines } = createSession();
    const path = join(dir, "annotations.csv");

    expect(session.exportCsv(path)).toBeNull();
    expect(existsSync(path)).toBe(false);
    expect(lines).toEqual([{ level: "warn", message: "No annotations to export." }]);
  });
});
