import { PassThrough, Readable } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { ModelDownloadTracker } from "../../src/ai/providers/modelDownload";
import type { HttpPost } from "../../src/ai/providers";

const cfg = { baseUrl: "http://ollama.test", model: "tinyllama" };

describe("ModelDownloadTracker", () => {
  it("reports completed without pulling when the model is already there", async () => {
    const post = vi.fn<HttpPost>(async () => ({ data: Readable.from([]) }));
    const tracker = new ModelDownloadTracker(cfg, async () => true, post);

    expect(await tracker.start()).toEqual({
      status: "completed",
      progress: 100,
      message: "tinyllama is already downloaded",
    });
    expect(post).not.toHaveBeenCalled();
  });

  it("follows the streamed progress and verifies at the end", async () => {
    const availability = [false, true];
    const post = vi.fn<HttpPost>(async () => ({
      data: Readable.from([
        '{"status":"pulling manifest"}\n{"status":"downloading","total":200,',
        '"completed":100}\n',
        '{"status":"verifying sha256 digest"}',
      ]),
    }));
    const tracker = new ModelDownloadTracker(cfg, async () => availability.shift() ?? true, post);

    expect(await tracker.start()).toEqual({ status: "downloading", progress: 0, message: "Starting download..." });
    await tracker.settled();

    expect(tracker.progress()).toEqual({
      status: "completed",
      progress: 100,
      message: "tinyllama downloaded successfully!",
    });
    expect(post.mock.calls[0]?.[0]).toBe("http://ollama.test/api/pull");
    expect(post.mock.calls[0]?.[1]).toEqual({ model: "tinyllama", stream: true });
  });

  it("fails on an error line and keeps the progress reached", async () => {
    const post = vi.fn<HttpPost>(async () => ({
      data: Readable.from(['{"total":100,"completed":40}\n{"error":"pull model manifest: not found"}\n']),
    }));
    const tracker = new ModelDownloadTracker(cfg, async () => false, post);

    await tracker.start();
    await tracker.settled();

    expect(tracker.progress()).toEqual({
      status: "failed",
      progress: 40,
      message: "Error: pull model manifest: not found",
    });
  });

  it("does not start a second pull while one is running", async () => {
    const stream = new PassThrough();
    const post = vi.fn<HttpPost>(async () => ({ data: stream }));
    const tracker = new ModelDownloadTracker(cfg, async () => false, post);

    await tracker.start();
    const again = await tracker.start();

    expect(again.status).toBe("downloading");
    expect(post).toHaveBeenCalledTimes(1);

    stream.end();
    await tracker.settled();
    expect(tracker.progress()).toEqual({
      status: "failed",
      progress: 0,
      message: "Download finished but model not found",
    });
  });
});
