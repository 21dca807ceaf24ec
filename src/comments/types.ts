export interface MultiLineDelimiters {
  start: string;
  /** Prefix repeated on every inner line, e.g. `*` in C block comments. */
  middle?: string;
  end: string;
  /** Whitespace placed before `middle` and `end`. */
  indent: string;
}

export interface CommentStyle {
  name: string;
  singleLinePrefix?: string;
  multiLine?: MultiLineDelimiters;
}

export type CommentForm = 'single' | 'multi';
