/**
 * User-facing scan output. Kept apart from the diagnostic logger so the
 * interactive prompt and summary stay on stdout.
 */
export interface ScanReporter {
  line(text?: string): void;
  write(text: string): void;
}

export class ConsoleReporter implements ScanReporter {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  line(text = ''): void {
    this.stream.write(`${text}\n`);
  }

  write(text: string): void {
    this.stream.write(text);
  }
}
