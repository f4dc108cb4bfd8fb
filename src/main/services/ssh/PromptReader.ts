/**
 * PromptReader
 *
 * Stateful stream parser that decides when a command sent to an interactive
 * device shell has finished: the device prints its prompt again. Output is
 * everything between the echoed command line and that prompt.
 *
 * Parser lifecycle:
 *   WAITING_FOR_ECHO → skip the device's echo of the typed command
 *   CAPTURING        → accumulate output; watch the buffer tail for the prompt
 *   DONE             → prompt seen; ignore further data
 *
 * The prompt pattern is tested against a CSI-stripped copy of the buffer so
 * colored prompts still match. Only the last TAIL_RESERVE characters are kept
 * in the live buffer once it grows; older text moves to the capture, which is
 * capped at maxOutputChars.
 */

import { stripAnsi, stripCsi } from './ansiStripper';

export interface PromptReaderConfig {
  promptPattern: RegExp;
  /**
   * True when the first line of data is the device echoing what was typed.
   * False for banners, and for secrets (which are not echoed).
   */
  expectEcho: boolean;
  maxOutputChars: number;
}

export interface PromptFeedResult {
  complete: boolean;
  /** The prompt text that ended the read, once complete. */
  prompt: string | null;
}

type ReaderState = 'WAITING_FOR_ECHO' | 'CAPTURING' | 'DONE';

export class PromptReader {
  /**
   * Characters retained in the live buffer so a prompt split across chunks is
   * still found.
   */
  private static readonly TAIL_RESERVE = 512;

  /** Past this size with no newline, assume the echo was swallowed. */
  private static readonly MAX_ECHO_BUFFER = 2000;

  private state: ReaderState;
  private buffer = '';
  /** Raw text drained out of the buffer, capped. */
  private captured = '';
  private output = '';
  private prompt: string | null = null;

  constructor(private readonly config: PromptReaderConfig) {
    this.state = config.expectEcho ? 'WAITING_FOR_ECHO' : 'CAPTURING';
  }

  feed(chunk: string): PromptFeedResult {
    if (this.state === 'DONE') {
      return { complete: true, prompt: this.prompt };
    }

    this.buffer += chunk;

    if (this.state === 'WAITING_FOR_ECHO') {
      const newlineIdx = this.buffer.indexOf('\n');
      if (newlineIdx === -1) {
        if (this.buffer.length <= PromptReader.MAX_ECHO_BUFFER) {
          return { complete: false, prompt: null };
        }
      } else {
        this.buffer = this.buffer.substring(newlineIdx + 1);
      }
      this.state = 'CAPTURING';
    }

    return this.handleCapturing();
  }

  isComplete(): boolean {
    return this.state === 'DONE';
  }

  /** Final output; empty until the prompt has been seen. */
  getOutput(): string {
    return this.output;
  }

  /** Everything received so far, cleaned. Used for timeout diagnostics. */
  getAccumulatedOutput(): string {
    return stripAnsi(this.captured + this.buffer).trim();
  }

  getPrompt(): string | null {
    return this.prompt;
  }

  private handleCapturing(): PromptFeedResult {
    const clean = stripCsi(this.buffer);
    const match = this.config.promptPattern.exec(clean);

    if (match) {
      this.prompt = match[0].trim();
      const raw = this.captured + clean.substring(0, match.index);
      this.output = this.cap(stripAnsi(raw).replace(/^\n+/, '').replace(/\s+$/, ''));
      this.captured = '';
      this.buffer = '';
      this.state = 'DONE';
      return { complete: true, prompt: this.prompt };
    }

    this.drain();
    return { complete: false, prompt: null };
  }

  private drain(): void {
    const safeLength = this.buffer.length - PromptReader.TAIL_RESERVE;
    if (safeLength <= 0) return;

    const head = this.buffer.substring(0, safeLength);
    this.buffer = this.buffer.substring(safeLength);

    const room = this.config.maxOutputChars - this.captured.length;
    if (room > 0) this.captured += head.substring(0, room);
  }

  private cap(content: string): string {
    return content.length > this.config.maxOutputChars
      ? content.substring(0, this.config.maxOutputChars)
      : content;
  }
}
