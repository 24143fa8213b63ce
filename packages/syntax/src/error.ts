export type ParseErrorKind =
  | 'Malformed'
  | 'IntegerOverflow'
  | 'InvalidEscape'
  | 'UnmatchedBrackets'
  | 'EmptyCall'
  | 'InvalidCall'
  | 'NoParser';

export class ParseError extends Error {
  constructor(
    public kind: ParseErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ParseError';
  }
}
