/**
 * A unit of text: an identifier, an optional language and one or more lines
 */
export class TextFragment {
  constructor(
    public readonly identifier: string,
    public language: string | null,
    public readonly lines: string[],
  ) {}

  /** The lines joined by a single space */
  get text(): string {
    return this.lines.join(' ');
  }

  get charsCount(): number {
    return this.text.length;
  }

  toString(): string {
    return `${this.identifier} ${this.text}`;
  }
}
