import type { VerificationStatus } from '../../../domain/verification/types.js';
import type { BatchProgress } from '../types.js';

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

const fmt = (color: keyof typeof COLORS, text: string): string =>
  `${COLORS[color]}${text}${COLORS.reset}`;

const STATUS_STYLES: Record<VerificationStatus, { color: keyof typeof COLORS; symbol: string }> = {
  success: { color: 'green', symbol: '✓' },
  partial_failure: { color: 'yellow', symbol: '~' },
  failed: { color: 'red', symbol: '✗' },
};

export const formatStatus = (status: VerificationStatus, colored: boolean): string => {
  const style = STATUS_STYLES[status];
  const text = `${style.symbol} ${status}`;
  return colored ? fmt(style.color, text) : text;
};

const PHASE_LABELS: Record<BatchProgress['phase'], string> = {
  scanning: 'Scanning folder',
  classifying: 'Classifying documents',
  verifying: 'Verifying documents',
};

export class ProgressReporter {
  private enabled: boolean;
  private lastLineLength = 0;

  constructor(
    enabled = true,
    private out: NodeJS.WriteStream = process.stdout
  ) {
    this.enabled = enabled && Boolean(out.isTTY);
  }

  update(progress: BatchProgress): void {
    if (!this.enabled) return;

    this.clearLine();
    const phase = fmt('cyan', `[${progress.current}/${progress.total}]`);
    const label = PHASE_LABELS[progress.phase];
    const file = progress.currentFile ? fmt('dim', ` - ${progress.currentFile}`) : '';
    const line = `${phase} ${label}${file}`;
    this.out.write(line);
    this.lastLineLength = line.length;
  }

  complete(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    this.out.write(`${fmt('green', '✓')} ${message}\n`);
    this.lastLineLength = 0;
  }

  result(fileName: string, status: VerificationStatus): void {
    if (!this.enabled) return;
    this.clearLine();
    this.out.write(`${formatStatus(status, true)} ${fmt('bold', fileName)}\n`);
    this.lastLineLength = 0;
  }

  warn(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    this.out.write(`${fmt('yellow', '⚠')} ${message}\n`);
    this.lastLineLength = 0;
  }

  /** Failures print even when progress output is off. */
  error(message: string): void {
    this.clearLine();
    process.stderr.write(`${fmt('red', '✗')} ${message}\n`);
    this.lastLineLength = 0;
  }

  private clearLine(): void {
    if (this.lastLineLength > 0) {
      this.out.write(`\r${' '.repeat(this.lastLineLength)}\r`);
      this.lastLineLength = 0;
    }
  }
}
