import type { TranscriptSink } from "../src/spec/types.js";

export interface MemorySink extends TranscriptSink {
  transcripts: string[];
  lines(index?: number): string[];
}

export function memorySink(): MemorySink {
  const transcripts: string[] = [];
  return {
    transcripts,
    write: (transcript) => {
      transcripts.push(transcript);
    },
    lines: (index = 0) => (transcripts[index] ?? "").split("\n"),
  };
}
