import { posix } from 'node:path';
import type { SerialLink } from '../../src/core/target/serial-link.js';

interface DeviceRequest {
  op: string;
  [key: string]: unknown;
}

export interface FakeDeviceOptions {
  sysPath?: string[];
  /** Answer these ops with an OSError */
  failOps?: string[];
  /** Make the helper installation raise */
  brokenHelper?: boolean;
}

/**
 * A MicroPython friendly REPL with the helper's request protocol, in memory.
 * Responses are wrapped in terminal escape sequences like a real console.
 */
export class FakeReplDevice implements SerialLink {
  readonly files = new Map<string, Buffer>();
  readonly dirs = new Set<string>(['/', '/lib']);
  readonly requests: DeviceRequest[] = [];
  /** Every line received, in order */
  readonly lines: string[] = [];
  helperSource: string | null = null;
  closed = false;

  private output = '';
  private line = '';
  private helperBuffer: string | null = null;

  constructor(private readonly options: FakeDeviceOptions = {}) {}

  async write(data: string): Promise<void> {
    for (const ch of data) {
      if (ch === '\x03') {
        this.line = '';
        this.output += '\r\nKeyboardInterrupt: \r\n>>> ';
      } else if (ch === '\r') {
        const line = this.line;
        this.line = '';
        this.processLine(line);
      } else {
        this.line += ch;
      }
    }
  }

  async readUntil(terminator: string): Promise<string> {
    const index = this.output.indexOf(terminator);
    if (index === -1) {
      throw new Error(`timed out waiting for ${JSON.stringify(terminator)}`);
    }
    const end = index + terminator.length;
    const received = this.output.slice(0, end);
    this.output = this.output.slice(end);
    return received;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  putFile(path: string, content: string | Buffer): void {
    let dir = posix.dirname(path);
    while (!this.dirs.has(dir)) {
      this.dirs.add(dir);
      dir = posix.dirname(dir);
    }
    this.files.set(path, Buffer.isBuffer(content) ? content : Buffer.from(content, 'utf8'));
  }

  private processLine(line: string): void {
    this.lines.push(line);
    this.output += line + '\r\n';
    if (line === '') {
      this.output += '>>> ';
      return;
    }
    if (line === "print('#PB' + ' READY')") {
      this.output += '#PB READY\r\n>>> ';
      return;
    }
    if (line === "__pbh=''") {
      this.helperBuffer = '';
      this.output += '>>> ';
      return;
    }
    const append = line.match(/^__pbh\+='([A-Za-z0-9+/=]*)'$/);
    if (append && this.helperBuffer !== null) {
      this.helperBuffer += append[1];
      this.output += '>>> ';
      return;
    }
    if (line === "exec(__import__('binascii').a2b_base64(__pbh).decode());del __pbh" && this.helperBuffer !== null) {
      if (this.options.brokenHelper) {
        this.output += 'Traceback (most recent call last):\r\n  File "<stdin>", line 1\r\nSyntaxError: invalid syntax\r\n>>> ';
        return;
      }
      this.helperSource = Buffer.from(this.helperBuffer, 'base64').toString('utf8');
      this.helperBuffer = null;
      this.output += '>>> ';
      return;
    }
    const call = line.match(/^__pb\('(.*)'\)$/);
    if (call && this.helperSource !== null) {
      const request: DeviceRequest = JSON.parse(call[1].replace(/\\(.)/g, '$1'));
      this.requests.push(request);
      let response: unknown;
      try {
        response = { ok: true, result: this.handle(request) };
      } catch (error) {
        response = { ok: false, error: error instanceof Error ? error.message : String(error) };
      }
      this.output += `\x1b[0m#PB ${JSON.stringify(response)}\x1b[K\r\n>>> `;
      return;
    }
    this.output += 'Traceback (most recent call last):\r\nNameError: name not defined\r\n>>> ';
  }

  private handle(request: DeviceRequest): unknown {
    if (this.options.failOps?.includes(request.op)) {
      throw new Error('OSError: [Errno 5] EIO');
    }
    const path = typeof request.path === 'string' ? request.path : '';
    switch (request.op) {
      case 'info':
        return { implementation: 'micropython', version: '1.22.0', mpy: 6, path: this.options.sysPath ?? ['', '.frozen', '/lib'] };
      case 'ls': {
        if (!this.dirs.has(path)) return [];
        const children = new Map<string, boolean>();
        for (const dir of this.dirs) {
          if (dir !== path && posix.dirname(dir) === path) children.set(posix.basename(dir), true);
        }
        for (const file of this.files.keys()) {
          if (posix.dirname(file) === path) children.set(posix.basename(file), false);
        }
        return [...children];
      }
      case 'read': {
        const content = this.files.get(path);
        if (!content) throw new Error('OSError: [Errno 2] ENOENT');
        const offset = Number(request.offset);
        return content.subarray(offset, offset + Number(request.size)).toString('base64');
      }
      case 'write': {
        if (!this.dirs.has(posix.dirname(path))) throw new Error('OSError: [Errno 2] ENOENT');
        const chunk = Buffer.from(String(request.data), 'base64');
        const previous = request.append ? this.files.get(path) ?? Buffer.alloc(0) : Buffer.alloc(0);
        this.files.set(path, Buffer.concat([previous, chunk]));
        return null;
      }
      case 'rm':
        this.files.delete(path);
        return null;
      case 'mkdir': {
        let current = '';
        for (const part of path.split('/').filter(Boolean)) {
          current += '/' + part;
          this.dirs.add(current);
        }
        return null;
      }
      case 'rmdir': {
        if (!this.dirs.has(path)) return false;
        const busy = [...this.dirs].some(dir => dir !== path && dir.startsWith(path + '/')) ||
          [...this.files.keys()].some(file => file.startsWith(path + '/'));
        if (busy) return false;
        this.dirs.delete(path);
        return true;
      }
      case 'sync':
        return null;
      default:
        throw new Error(`KeyError: ${request.op}`);
    }
  }
}
