import type { Command } from './command.js';

export type ParseErrorKind = 'unrecognized-command' | 'invalid-input';

export interface ParseError {
  readonly kind: ParseErrorKind;
  readonly message: string;
}

export type ParseResult =
  | { readonly type: 'success'; readonly command: Command }
  | { readonly type: 'error'; readonly error: ParseError };

/** Out-of-bounds is the only execution-time failure, and it is already reported when returned */
export type ExecutionResult =
  | { readonly type: 'success' }
  | { readonly type: 'exit' }
  | { readonly type: 'out-of-bounds'; readonly index: number };

