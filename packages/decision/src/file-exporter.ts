// packages/decision/src/file-exporter.ts
import { mkdir, open, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { encodeRecordLine } from "./codec.js";
import { ExportError, errorMessage } from "./errors.js";
import { SerialQueue, type DecisionExporter, type ExportResult } from "./exporter.js";
import type { DecisionRecord } from "./record.js";

export type FileJsonlExporterOptions = {
  name?: string;
  /**
   * datasync after every line (default true).
   * With false a record is handed to the OS before append() resolves
   * but may be lost on power failure until the next flush().
   */
  fsync?: boolean;
};

/**
 * Line-delimited JSON sink: one record per line, appended.
 */
export class FileJsonlExporter implements DecisionExporter {
  readonly name: string;
  private readonly queue = new SerialQueue();
  readonly fsync: boolean;
  private handle: FileHandle | null = null;
  private closed = false;
  // the file may end in a partial line; the next record starts on a fresh one
  private torn = false;

  constructor(
    readonly filePath: string,
    opts: FileJsonlExporterOptions = {}
  ) {
    this.name = opts.name ?? `jsonl:${path.basename(filePath)}`;
    this.fsync = opts.fsync ?? true;
  }

  private async ensureHandle(): Promise<FileHandle> {
    if (this.handle) return this.handle;
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const handle = await open(this.filePath, "a+");

    const { size } = await handle.stat();
    if (size > 0) {
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      this.torn = last[0] !== 0x0a;
    }

    this.handle = handle;
    return handle;
  }

  append(record: DecisionRecord): Promise<ExportResult> {
    return this.queue.run(async (): Promise<ExportResult> => {
      if (this.closed) {
        return {
          ok: false,
          error: new ExportError(this.name, record.decision_id, "CLOSED", "exporter is closed"),
        };
      }

      try {
        const handle = await this.ensureHandle();
        await handle.appendFile(`${this.torn ? "\n" : ""}${encodeRecordLine(record)}\n`);
        this.torn = false;
        if (this.fsync) await handle.datasync();
        return { ok: true };
      } catch (e) {
        this.torn = true;
        return {
          ok: false,
          error: new ExportError(this.name, record.decision_id, "APPEND_FAILED", errorMessage(e), { cause: e }),
        };
      }
    });
  }

  flush(): Promise<void> {
    return this.queue.run(async () => {
      if (this.handle) await this.handle.datasync();
    });
  }

  close(): Promise<void> {
    return this.queue.run(async () => {
      if (this.closed) return;
      this.closed = true;
      if (this.handle) {
        const h = this.handle;
        this.handle = null;
        await h.datasync();
        await h.close();
      }
    });
  }
}
