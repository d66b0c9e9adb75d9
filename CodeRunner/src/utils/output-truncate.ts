/**
 * Head+tail truncation for captured output.
 *
 * Output over `maxChars` keeps its first `head` and last `tail` characters
 * around a marker naming how much was dropped. `OutputCapture` applies the
 * same rule while a stream is still arriving, so memory stays bounded by
 * `maxChars` plus one chunk no matter how much a child prints.
 */

import { StringDecoder } from 'node:string_decoder';

export interface TruncateConfig {
  maxChars: number;
  head: number;
  tail: number;
}

export interface TruncateResult {
  text: string;
  truncated: boolean;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** End index for a head of at most `max` units that does not split a surrogate pair */
function headEnd(text: string, max: number): number {
  if (max >= text.length) return text.length;
  if (max > 0 && isHighSurrogate(text.charCodeAt(max - 1)) && isLowSurrogate(text.charCodeAt(max))) {
    return max - 1;
  }
  return max;
}

/** Start index for a tail of at most `max` units that does not split a surrogate pair */
function tailStart(text: string, max: number): number {
  if (max >= text.length) return 0;
  const start = text.length - max;
  if (isLowSurrogate(text.charCodeAt(start)) && isHighSurrogate(text.charCodeAt(start - 1))) {
    return start + 1;
  }
  return start;
}

export function truncationMarker(dropped: number): string {
  return `\n\n[... truncated ${dropped} characters ...]\n\n`;
}

export class OutputCapture {
  private readonly config: TruncateConfig;
  private readonly decoder = new StringDecoder('utf8');
  /** Whole output until it overflows, then the rolling tail window */
  private text = '';
  private head = '';
  private dropped = 0;
  private overflowed = false;

  constructor(config: TruncateConfig) {
    this.config = config;
  }

  /** Raw bytes from a stream; multi-byte characters split across chunks are held back */
  write(chunk: Buffer): void {
    this.push(this.decoder.write(chunk));
  }

  push(piece: string): void {
    if (!piece) return;
    this.text += piece;

    if (!this.overflowed) {
      if (this.text.length <= this.config.maxChars) return;
      this.overflowed = true;
      const end = headEnd(this.text, this.config.head);
      this.head = this.text.slice(0, end);
      this.text = this.text.slice(end);
    }

    const start = tailStart(this.text, this.config.tail);
    this.dropped += start;
    this.text = this.text.slice(start);
  }

  finish(): TruncateResult {
    this.push(this.decoder.end());
    if (!this.overflowed) {
      return { text: this.text, truncated: false };
    }
    return { text: this.head + truncationMarker(this.dropped) + this.text, truncated: true };
  }
}

export function truncateOutput(output: string, config: TruncateConfig): TruncateResult {
  const capture = new OutputCapture(config);
  capture.push(output);
  return capture.finish();
}
