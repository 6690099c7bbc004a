import type { TextFragment } from './text-fragment.js';
import { timeToSsmmm } from './time.js';

/**
 * A sync map fragment connects a text fragment with a begin/end interval (seconds).
 * Times come from codecs or callers and are not validated here.
 */
export class SyncMapFragment {
  constructor(
    public readonly textFragment: TextFragment,
    public begin: number,
    public end: number,
  ) {}

  get identifier(): string {
    return this.textFragment.identifier;
  }

  get language(): string | null {
    return this.textFragment.language;
  }

  get lines(): string[] {
    return this.textFragment.lines;
  }

  get text(): string {
    return this.textFragment.text;
  }

  /** Duration of the interval in seconds */
  get length(): number {
    return this.end - this.begin;
  }

  toString(): string {
    return `${this.identifier} ${timeToSsmmm(this.begin)} ${timeToSsmmm(this.end)} ${this.text}`;
  }
}
