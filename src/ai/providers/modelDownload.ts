// src/ai/providers/modelDownload.ts
import { Readable } from "stream";
import { z } from "zod";
import { describeHttpError } from "./http";
import type { HttpPost } from "./types";

export type DownloadStatus = "idle" | "downloading" | "completed" | "failed";

export type DownloadProgress = {
  status: DownloadStatus;
  progress: number; // 0..100
  message: string;
};

const PullLine = z.object({
  status: z.string().optional(),
  error: z.string().optional(),
  total: z.number().optional(),
  completed: z.number().optional(),
});

/**
 * Pulls the local model through Ollama's streaming /api/pull and keeps the
 * progress for whoever asks. One instance per local backend.
 */
export class ModelDownloadTracker {
  private state: DownloadProgress = { status: "idle", progress: 0, message: "" };
  private running: Promise<void> | null = null;

  constructor(
    private readonly cfg: { baseUrl: string; model: string },
    private readonly isAvailable: () => Promise<boolean>,
    private readonly post: HttpPost
  ) {}

  progress(): DownloadProgress {
    return { ...this.state };
  }

  /** Starts a pull unless one is running or the model is already there. */
  async start(): Promise<DownloadProgress> {
    if (this.state.status === "downloading") return this.progress();

    if (await this.isAvailable()) {
      this.state = { status: "completed", progress: 100, message: `${this.cfg.model} is already downloaded` };
      return this.progress();
    }

    this.state = { status: "downloading", progress: 0, message: "Starting download..." };
    this.running = this.pull().catch((e: unknown) => {
      this.state = { status: "failed", progress: this.state.progress, message: `Error: ${describeHttpError(e)}` };
      console.error("[AI][tinyllama][pull] failed", this.state.message);
    });
    return this.progress();
  }

  /** Resolves once the current pull (if any) has settled. */
  async settled(): Promise<void> {
    if (this.running) await this.running;
  }

  private async pull(): Promise<void> {
    const res = await this.post(
      `${this.cfg.baseUrl}/api/pull`,
      { model: this.cfg.model, stream: true },
      { headers: { "Content-Type": "application/json" }, responseType: "stream" }
    );
    if (!(res.data instanceof Readable)) throw new Error("pull did not return a stream");

    let buffered = "";
    for await (const chunk of res.data) {
      buffered += Buffer.isBuffer(chunk) ? chunk.toString("utf8") : String(chunk);
      const lines = buffered.split("\n");
      buffered = lines.pop() ?? "";
      for (const line of lines) this.applyLine(line);
    }
    if (buffered.trim()) this.applyLine(buffered);

    if (this.state.status !== "downloading") return;

    if (await this.isAvailable()) {
      this.state = { status: "completed", progress: 100, message: `${this.cfg.model} downloaded successfully!` };
      console.log("[AI][tinyllama][pull] completed");
    } else {
      this.state = { status: "failed", progress: this.state.progress, message: "Download finished but model not found" };
    }
  }

  private applyLine(line: string): void {
    const t = line.trim();
    if (!t) return;

    let json: unknown;
    try {
      json = JSON.parse(t);
    } catch {
      return; // partial or non-JSON noise
    }
    const parsed = PullLine.safeParse(json);
    if (!parsed.success) return;
    const { status, error, total, completed } = parsed.data;

    if (error) throw new Error(error);
    if (status) this.state.message = status;
    if (total && completed !== undefined && total > 0) {
      // hold back the last few percent until the model is verified
      this.state.progress = Math.min(95, Math.floor((completed / total) * 100));
    }
  }
}
