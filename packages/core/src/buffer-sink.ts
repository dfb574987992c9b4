import type { OutputSink } from './types/output.js';

export interface BufferSink extends OutputSink {
  readonly printed: string[];
  readonly errors: string[];
}

/** Sink that keeps every line in memory instead of rendering it */
export function createBufferSink(): BufferSink {
  const printed: string[] = [];
  const errors: string[] = [];
  return {
    printed,
    errors,
    print: (line) => { printed.push(line); },
    error: (line) => { errors.push(line); },
  };
}
