import { describe, it, expect, vi } from "vitest";
import type { ObjectStorage, OcrBlock, OcrService, TextModel } from "../types/Capabilities.js";
import type { PipelineSettings } from "../utils/config.js";
import { ThrottlingError } from "../utils/errors.js";
import { EMPTY_DOCUMENT_SUMMARY } from "./ReduceService.js";
import { createPipeline, parseUploadEvent, processUpload } from "./SummaryPipelineService.js";

const BUCKET = "docs-bucket";

const defaultSettings: PipelineSettings = {
  maxTokensPerChunk: 100,
  maxOutputTokens: 200,
  pollIntervalMs: 5000,
  maxPollAttempts: 60,
  throttleBaseDelayMs: 2000,
  maxThrottleRetries: 5,
};

const line = (text: string): OcrBlock => ({ blockType: "LINE", text });

function s3Event(key: string) {
  return { Records: [{ s3: { bucket: { name: BUCKET }, object: { key } } }] };
}

function setup(settings: Partial<PipelineSettings> = {}) {
  const putText = vi.fn<ObjectStorage["putText"]>().mockResolvedValue(undefined);
  const ocr = {
    detectText: vi.fn<OcrService["detectText"]>(),
    startTextDetection: vi.fn<OcrService["startTextDetection"]>(),
    getTextDetection: vi.fn<OcrService["getTextDetection"]>(),
  };
  const invoke = vi.fn<TextModel["invoke"]>();
  const sleep = vi.fn(async (_ms: number) => {});

  const pipeline = createPipeline(
    { storage: { putText }, ocr, textModel: { invoke } },
    { ...defaultSettings, ...settings },
    "test-model",
    sleep
  );

  const loadPipeline = vi.fn(async () => pipeline);

  const externalCalls = () =>
    loadPipeline.mock.calls.length +
    ocr.detectText.mock.calls.length +
    ocr.startTextDetection.mock.calls.length +
    ocr.getTextDetection.mock.calls.length +
    invoke.mock.calls.length +
    putText.mock.calls.length;

  return { loadPipeline, putText, ocr, invoke, sleep, externalCalls };
}

describe("parseUploadEvent", () => {
  it("decodes the object key of the first record", () => {
    const event = {
      Records: [
        { s3: { bucket: { name: BUCKET }, object: { key: "scans/team+photo%281%29.png" } } },
        { s3: { bucket: { name: "other" }, object: { key: "ignored.png" } } },
      ],
    };

    expect(parseUploadEvent(event)).toEqual({ bucket: BUCKET, key: "scans/team photo(1).png" });
  });
});

describe("processUpload", () => {
  it.each([
    ["no records", {}],
    ["empty records", { Records: [] }],
    ["missing key", { Records: [{ s3: { bucket: { name: BUCKET }, object: {} } }] }],
    ["missing bucket", { Records: [{ s3: { object: { key: "a.pdf" } } }] }],
    ["bad key encoding", s3Event("broken%E0%A4%A.pdf")],
  ])("returns 400 for a malformed trigger (%s)", async (_name, event) => {
    const { loadPipeline, externalCalls } = setup();

    const result = await processUpload(event, loadPipeline);

    expect(result.statusCode).toBe(400);
    expect(externalCalls()).toBe(0);
  });

  it.each(["notes.docx", "data.csv", "archive", "photo.gif"])(
    "returns 400 for unsupported document %s before any external call",
    async (key) => {
      const { loadPipeline, externalCalls } = setup();

      const result = await processUpload(s3Event(key), loadPipeline);

      expect(result.statusCode).toBe(400);
      expect(result.body).toContain("Unsupported document format");
      expect(externalCalls()).toBe(0);
    }
  );

  it.each(["reports/q3-summary.txt", "SCAN-SUMMARY.TXT"])(
    "skips summary artifact %s",
    async (key) => {
      const { loadPipeline, externalCalls } = setup();

      const result = await processUpload(s3Event(key), loadPipeline);

      expect(result).toEqual({ statusCode: 200, body: `Skipped ${key}: already a summary` });
      expect(externalCalls()).toBe(0);
    }
  );

  it.each(["page.png", "page.jpeg", "page.jpg", "page.tiff", "PAGE.PNG"])(
    "accepts image %s",
    async (key) => {
      const { loadPipeline, ocr, invoke } = setup();
      ocr.detectText.mockResolvedValue([line("Some text.")]);
      invoke.mockResolvedValue("Summary.");

      const result = await processUpload(s3Event(key), loadPipeline);

      expect(result.statusCode).toBe(200);
    }
  );

  it("summarizes a short PNG with one model call and writes it verbatim", async () => {
    const { loadPipeline, ocr, invoke, putText } = setup();
    ocr.detectText.mockResolvedValue([line("Quarterly revenue grew by ten percent.")]);
    invoke.mockResolvedValue("Revenue grew 10%.");

    const result = await processUpload(s3Event("scans/page.png"), loadPipeline);

    expect(result).toEqual({
      statusCode: 200,
      body: "Summary written to s3://docs-bucket/scans/page-summary.txt",
    });
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(putText).toHaveBeenCalledTimes(1);
    expect(putText).toHaveBeenCalledWith(
      { bucket: BUCKET, key: "scans/page-summary.txt" },
      "Revenue grew 10%."
    );
  });

  it("condenses three chunk summaries with a fourth model call", async () => {
    // 10 tokens -> 40 characters per chunk; 99 characters + newline -> 3 chunks
    const { loadPipeline, ocr, invoke, putText } = setup({ maxTokensPerChunk: 10 });
    ocr.detectText.mockResolvedValue([line("x".repeat(99))]);
    invoke
      .mockResolvedValueOnce("First section summary.")
      .mockResolvedValueOnce("Second section summary.")
      .mockResolvedValueOnce("Third section summary.")
      .mockResolvedValueOnce("Overall overview.");

    const result = await processUpload(s3Event("long.png"), loadPipeline);

    expect(result.statusCode).toBe(200);
    expect(invoke).toHaveBeenCalledTimes(4);
    expect(invoke.mock.calls[3][0].prompt).toContain(
      "First section summary.\nSecond section summary.\nThird section summary."
    );
    expect(putText).toHaveBeenCalledWith(
      { bucket: BUCKET, key: "long-summary.txt" },
      "Overall overview."
    );
  });

  it("completes after one backoff when the first call is throttled", async () => {
    const { loadPipeline, ocr, invoke, sleep, putText } = setup();
    ocr.detectText.mockResolvedValue([line("Short text.")]);
    invoke
      .mockRejectedValueOnce(new ThrottlingError("Rate limit reached"))
      .mockResolvedValueOnce("Short summary.");

    const result = await processUpload(s3Event("note.png"), loadPipeline);

    expect(result.statusCode).toBe(200);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(putText).toHaveBeenCalledWith({ bucket: BUCKET, key: "note-summary.txt" }, "Short summary.");
  });

  it("summarizes a multi-page PDF through a text detection job", async () => {
    const { loadPipeline, ocr, invoke, sleep, putText } = setup();
    ocr.startTextDetection.mockResolvedValue("job-7");
    ocr.getTextDetection
      .mockResolvedValueOnce({ status: "IN_PROGRESS", blocks: [] })
      .mockResolvedValueOnce({ status: "SUCCEEDED", blocks: [line("Page one")], nextToken: "t2" })
      .mockResolvedValueOnce({ status: "SUCCEEDED", blocks: [line("Page two")] });
    invoke.mockResolvedValue("Two pages.");

    const result = await processUpload(s3Event("contracts/lease.pdf"), loadPipeline);

    expect(result.statusCode).toBe(200);
    expect(ocr.startTextDetection).toHaveBeenCalledWith({ bucket: BUCKET, key: "contracts/lease.pdf" });
    expect(sleep.mock.calls).toEqual([[5000], [5000]]);
    expect(invoke.mock.calls[0][0].prompt).toContain("Page one\nPage two\n");
    expect(putText).toHaveBeenCalledWith(
      { bucket: BUCKET, key: "contracts/lease-summary.txt" },
      "Two pages."
    );
  });

  it("returns 500 and writes nothing when the job times out", async () => {
    const { loadPipeline, ocr, invoke, putText } = setup({ maxPollAttempts: 2 });
    ocr.startTextDetection.mockResolvedValue("job-8");
    ocr.getTextDetection.mockResolvedValue({ status: "IN_PROGRESS", blocks: [] });

    const result = await processUpload(s3Event("slow.pdf"), loadPipeline);

    expect(result).toEqual({
      statusCode: 500,
      body: "Text detection job job-8 did not finish after 2 polls",
    });
    expect(invoke).not.toHaveBeenCalled();
    expect(putText).not.toHaveBeenCalled();
  });

  it("returns 500 and writes nothing when a later chunk fails", async () => {
    const { loadPipeline, ocr, invoke, putText } = setup({ maxTokensPerChunk: 10 });
    ocr.detectText.mockResolvedValue([line("y".repeat(79))]);
    invoke
      .mockResolvedValueOnce("First summary.")
      .mockRejectedValueOnce(new Error("Model not found"));

    const result = await processUpload(s3Event("fails.png"), loadPipeline);

    expect(result).toEqual({ statusCode: 500, body: "Model test-model call failed" });
    expect(putText).not.toHaveBeenCalled();
  });

  it("decodes the key before extracting and writing", async () => {
    const { loadPipeline, ocr, invoke, putText } = setup();
    ocr.detectText.mockResolvedValue([line("Team photo caption.")]);
    invoke.mockResolvedValue("A caption.");

    await processUpload(s3Event("scans/team+photo%281%29.png"), loadPipeline);

    expect(ocr.detectText).toHaveBeenCalledWith({ bucket: BUCKET, key: "scans/team photo(1).png" });
    expect(putText).toHaveBeenCalledWith(
      { bucket: BUCKET, key: "scans/team photo(1)-summary.txt" },
      "A caption."
    );
  });

  it("writes a placeholder for a document without text", async () => {
    const { loadPipeline, ocr, invoke, putText } = setup();
    ocr.detectText.mockResolvedValue([{ blockType: "PAGE" }]);

    const result = await processUpload(s3Event("blank.png"), loadPipeline);

    expect(result.statusCode).toBe(200);
    expect(invoke).not.toHaveBeenCalled();
    expect(putText).toHaveBeenCalledWith({ bucket: BUCKET, key: "blank-summary.txt" }, EMPTY_DOCUMENT_SUMMARY);
  });

  it("returns 500 when the summary cannot be stored", async () => {
    const { loadPipeline, ocr, invoke, putText } = setup();
    ocr.detectText.mockResolvedValue([line("Some text.")]);
    invoke.mockResolvedValue("Summary.");
    putText.mockRejectedValue(new Error("AccessDenied"));

    const result = await processUpload(s3Event("page.png"), loadPipeline);

    expect(result).toEqual({ statusCode: 500, body: "Unexpected error: AccessDenied" });
  });
});
