import stripAnsi from 'strip-ansi';
import { SERIAL_DEFAULTS } from '../../constants/index.js';
import { isPlainObject } from '../../utils/guards.js';
import { logger } from '../../utils/logger.js';
import type { SerialLink } from './serial-link.js';

export const REPL_PROMPT = '>>> ';
export const RESPONSE_MARKER = '#PB ';
const INTERRUPT = '\r\x03\x03';
const READY_MARKER = '#PB READY';
const HELPER_VARIABLE = '__pbh';

export class ReplError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReplError';
  }
}

/**
 * Request/response exchange with the helper installed in the friendly REPL.
 * Each request is one line `__pb('<json>')`; the helper prints one `#PB <json>` line.
 */
export class ReplProtocol {
  constructor(private readonly link: SerialLink, private readonly timeoutMs: number) {}

  async start(helperSource: string): Promise<void> {
    await this.link.write(INTERRUPT);
    await this.link.readUntil(REPL_PROMPT, this.timeoutMs);

    // Skip whatever banners and prompts the interrupt produced
    await this.link.write(`print('#PB' + ' READY')\r`);
    await this.link.readUntil(READY_MARKER, this.timeoutMs);
    await this.link.readUntil(REPL_PROMPT, this.timeoutMs);

    // Short lines, each answered by a prompt, so small UART buffers keep up
    const encoded = Buffer.from(helperSource, 'utf8').toString('base64');
    await this.sendLine(`${HELPER_VARIABLE}=''`);
    for (let offset = 0; offset < encoded.length; offset += SERIAL_DEFAULTS.HELPER_LINE_CHARS) {
      await this.sendLine(`${HELPER_VARIABLE}+='${encoded.slice(offset, offset + SERIAL_DEFAULTS.HELPER_LINE_CHARS)}'`);
    }
    await this.sendLine(`exec(__import__('binascii').a2b_base64(${HELPER_VARIABLE}).decode());del ${HELPER_VARIABLE}`);
    logger.debug('REPL helper installed');
  }

  /** Send one setup line and wait for its prompt */
  private async sendLine(line: string): Promise<void> {
    await this.link.write(line + '\r');
    const output = stripAnsi(await this.link.readUntil(REPL_PROMPT, this.timeoutMs));
    if (output.includes('Traceback')) {
      throw new ReplError(`helper installation failed: ${lastMeaningfulLine(output)}`);
    }
  }

  async request(op: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const line = `__pb(${toPythonStringLiteral(JSON.stringify({ op, ...args }))})`;
    await this.link.write(line + '\r');
    const raw = await this.link.readUntil(REPL_PROMPT, this.timeoutMs);
    return parseReplResponse(raw, line);
  }
}

/**
 * Single-quoted Python string literal.
 */
export function toPythonStringLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Extract the helper's result from raw REPL output: terminal escapes and the
 * echoed request are dropped before looking for the response line.
 */
export function parseReplResponse(raw: string, sentLine: string): unknown {
  const lines = stripAnsi(raw)
    .split(/\r?\n|\r/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && line !== REPL_PROMPT.trim() && !line.endsWith(sentLine));

  const responseLine = lines.find(line => line.startsWith(RESPONSE_MARKER));
  if (!responseLine) {
    throw new ReplError(`no response from device: ${lastMeaningfulLine(lines.join('\n')) || '(empty)'}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(responseLine.slice(RESPONSE_MARKER.length));
  } catch {
    throw new ReplError(`unreadable response from device: ${responseLine}`);
  }

  if (!isPlainObject(parsed) || typeof parsed.ok !== 'boolean') {
    throw new ReplError(`unexpected response from device: ${responseLine}`);
  }
  if (!parsed.ok) {
    throw new ReplError(typeof parsed.error === 'string' ? parsed.error : 'device reported an error');
  }
  return parsed.result ?? null;
}

function lastMeaningfulLine(text: string): string {
  const lines = text.split(/\r?\n/).map(line => line.trim()).filter(line => line && line !== REPL_PROMPT.trim());
  return lines[lines.length - 1] ?? '';
}
