import type { SampleWriter } from "./types";

export class DummySampleWriter implements SampleWriter {
  async write(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    return;
  }
}
