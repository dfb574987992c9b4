/**
 * Where the core writes its messages. Lines arrive pre-formatted;
 * the implementation decides how (and whether) to render them.
 */
export interface OutputSink {
  print(line: string): void;
  error(line: string): void;
}
