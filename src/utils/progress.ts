const BAR_LENGTH = 40;

/**
 * `[=====>-----] 50.0% (5/10)`. The bar is always `barLength` wide.
 */
export function formatProgressBar(current: number, total: number, barLength = BAR_LENGTH): string {
  if (total <= 0) return '';
  const percent = (current / total) * 100;
  const filled = Math.min(Math.floor((barLength * current) / total), barLength);
  const bar = filled >= barLength ? '='.repeat(barLength) : '='.repeat(filled) + '>' + '-'.repeat(barLength - filled - 1);
  return `[${bar}] ${percent.toFixed(1)}% (${current}/${total})`;
}

/**
 * Single-line progress display that redraws in place on a terminal and
 * stays silent when stdout is piped.
 */
export class ProgressBar {
  private readonly enabled: boolean;
  private drawn = false;

  constructor(
    private readonly total: number,
    private readonly stream: NodeJS.WriteStream = process.stdout
  ) {
    this.enabled = Boolean(stream.isTTY) && total > 0;
  }

  update(current: number, detail = ''): void {
    if (!this.enabled) return;
    const suffix = detail ? ` | ${detail}` : '';
    this.stream.write(`\rProgress: ${formatProgressBar(current, this.total)}${suffix}`);
    this.drawn = true;
  }

  /** Move past the bar so later output starts on a fresh line. */
  done(): void {
    if (this.drawn) {
      this.stream.write('\n');
      this.drawn = false;
    }
  }
}
