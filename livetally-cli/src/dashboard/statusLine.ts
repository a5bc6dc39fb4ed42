/**
 * Single-line live status, redrawn in place with a carriage return.
 */

import chalk from 'chalk';
import type { SessionView } from 'livetally-shared';
import { formatCount, formatTopActors, pad } from './formatters';

export function renderStatusLine(view: SessionView, c: chalk.Chalk = chalk): string {
  const { stats } = view;
  const field = (label: string, value: string, labelColor: chalk.Chalk, valueColor: chalk.Chalk): string =>
    `${labelColor(label)}=${valueColor(value)}`;

  return [
    field('viewers', pad(formatCount(view.viewerCount), 9), c.cyan, c.cyanBright),
    field('msg/s', pad(stats.perSecond.toFixed(1), 6), c.yellow, c.yellowBright),
    field('msg/min', pad(stats.perMinute, 6), c.yellow, c.yellowBright),
    field('uniq/s', pad(stats.uniquePerSecond, 6), c.magenta, c.magentaBright),
    field('uniq/min', pad(stats.uniquePerMinute, 6), c.magenta, c.magentaBright),
    field('total', pad(stats.total, 9), c.green, c.greenBright),
    field('uniq_total', pad(stats.uniqueTotal, 9), c.green, c.greenBright),
    field('top', pad(formatTopActors(stats.topActors), 32), c.blue, c.blueBright),
  ].join('  ');
}

export interface StatusOutput {
  write(text: string): unknown;
}

export class StatusLine {
  private drawn = false;

  constructor(
    private readonly out: StatusOutput = process.stdout,
    private readonly palette: chalk.Chalk = chalk,
  ) {}

  draw(view: SessionView): void {
    this.out.write('\r' + renderStatusLine(view, this.palette) + ' '.repeat(4));
    this.drawn = true;
  }

  /** Move off the status line so later output starts on a fresh line. */
  finish(): void {
    if (!this.drawn) return;
    this.out.write('\n');
    this.drawn = false;
  }
}
