import type { OutputPort, UnifiedSpinner } from '../../src/core/ports/output.js';

/**
 * Output port that keeps every message as `kind: text`.
 */
export class RecordingOutput implements OutputPort {
  readonly lines: string[] = [];
  readonly questions: string[] = [];

  constructor(private readonly answer = false) {}

  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }

  step(message: string): void {
    this.lines.push(`step: ${message}`);
  }

  success(message: string): void {
    this.lines.push(`success: ${message}`);
  }

  error(message: string): void {
    this.lines.push(`error: ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }

  note(content: string, title?: string): void {
    this.lines.push(`note: ${title ?? ''}\n${content}`);
  }

  async confirm(message: string): Promise<boolean> {
    this.questions.push(message);
    return this.answer;
  }

  spinner(): UnifiedSpinner {
    return {
      start: message => this.lines.push(`spinner: ${message}`),
      stop: () => undefined,
      message: () => undefined
    };
  }
}
