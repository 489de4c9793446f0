import { TERMINAL } from '../../constants';

export type KeyPress =
  | { kind: 'char'; value: string }
  | { kind: 'interrupt' };

/** Blocks until a single key is available. */
export interface KeyReader {
  readKey(): Promise<KeyPress>;
}

/** process.stdin, or any readable stream standing in for it */
export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

/**
 * Reads one key from stdin. On a TTY the stream is switched to raw mode for
 * the read so no Enter is needed. Piped input is read a line at a time: each
 * non-blank line supplies its first character, and lines that arrive in the
 * same chunk are kept for later reads. End of input or an aborted `signal`
 * counts as an interrupt.
 */
export class StdinKeyReader implements KeyReader {
  private buffered: string[] = [];

  constructor(
    private readonly input: KeyInput = process.stdin,
    private readonly signal?: AbortSignal
  ) {}

  readKey(): Promise<KeyPress> {
    const input = this.input;
    const raw = input.isTTY === true && typeof input.setRawMode === 'function';
    const signal = this.signal;
    if (signal?.aborted) {
      return Promise.resolve<KeyPress>({ kind: 'interrupt' });
    }
    const queued = this.buffered.shift();
    if (queued !== undefined) {
      return Promise.resolve<KeyPress>({ kind: 'char', value: queued });
    }

    return new Promise<KeyPress>((resolve) => {
      const finish = (key: KeyPress) => {
        input.off('data', onData);
        input.off('end', onEnd);
        signal?.removeEventListener('abort', onAbort);
        if (raw) input.setRawMode?.(false);
        input.pause();
        resolve(key);
      };
      const onData = (chunk: Buffer | string) => {
        const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
        if (text.includes(TERMINAL.CTRL_C)) {
          finish({ kind: 'interrupt' });
          return;
        }
        if (raw) {
          finish({ kind: 'char', value: text.charAt(0) });
          return;
        }
        const [first, ...rest] = text
          .split(/\r?\n/)
          .map((line) => line.trim())
          .filter((line) => line.length > 0)
          .map((line) => line.charAt(0));
        if (first === undefined) return;
        this.buffered.push(...rest);
        finish({ kind: 'char', value: first });
      };
      const onEnd = () => finish({ kind: 'interrupt' });
      const onAbort = () => finish({ kind: 'interrupt' });

      if (raw) input.setRawMode?.(true);
      input.on('data', onData);
      input.once('end', onEnd);
      signal?.addEventListener('abort', onAbort, { once: true });
      input.resume();
    });
  }
}
