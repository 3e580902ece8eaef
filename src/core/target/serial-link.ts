import { SerialPort } from 'serialport';
import { StringDecoder } from 'string_decoder';

/**
 * A text stream to a board. Exactly one adapter owns a link.
 */
export interface SerialLink {
  write(data: string): Promise<void>;
  /** Resolve with everything received up to and including `terminator` */
  readUntil(terminator: string, timeoutMs: number): Promise<string>;
  close(): Promise<void>;
}

export class SerialPortLink implements SerialLink {
  private buffer = '';
  private failure: Error | null = null;
  private wake: (() => void) | null = null;
  private readonly decoder = new StringDecoder('utf8');

  private constructor(private readonly port: SerialPort) {
    port.on('data', (chunk: Buffer) => {
      this.buffer += this.decoder.write(chunk);
      this.wake?.();
    });
    port.on('error', (error: Error) => {
      this.failure = error;
      this.wake?.();
    });
    port.on('close', () => {
      this.failure = this.failure ?? new Error('serial port closed');
      this.wake?.();
    });
  }

  static async open(path: string, baudRate: number): Promise<SerialPortLink> {
    const port = new SerialPort({ path, baudRate, autoOpen: false });
    await new Promise<void>((resolve, reject) => {
      port.open(error => (error ? reject(error) : resolve()));
    });
    return new SerialPortLink(port);
  }

  async write(data: string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.port.write(data, error => {
        if (error) reject(error);
      });
      this.port.drain(error => (error ? reject(error) : resolve()));
    });
  }

  async readUntil(terminator: string, timeoutMs: number): Promise<string> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const index = this.buffer.indexOf(terminator);
      if (index !== -1) {
        const end = index + terminator.length;
        const received = this.buffer.slice(0, end);
        this.buffer = this.buffer.slice(end);
        return received;
      }
      if (this.failure) {
        throw this.failure;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new Error(`timed out waiting for ${JSON.stringify(terminator)}`);
      }
      await new Promise<void>(resolve => {
        const done = (): void => {
          clearTimeout(timer);
          this.wake = null;
          resolve();
        };
        const timer = setTimeout(done, remaining);
        this.wake = done;
      });
    }
  }

  async close(): Promise<void> {
    if (!this.port.isOpen) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.port.close(error => (error ? reject(error) : resolve()));
    });
  }
}
