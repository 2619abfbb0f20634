import chalk, { type ChalkInstance } from 'chalk';
import type { CreditBlock, ModelQuota, QuotaPool, QuotaReport } from '@quotascope/protocol';

export type ReportView = 'pools' | 'models';

export interface ProgressBarConfig {
  width: number;
  filledChar: string;
  emptyChar: string;
}

export const DEFAULT_PROGRESS_BAR_CONFIG: ProgressBarConfig = {
  width: 10,
  filledChar: '\u2588', // █ (full block)
  emptyChar: '\u2591', // ░ (light shade)
};

/** `Ready!`, `Nm`, `Nh Nm` or `Nd Nh`, counting started minutes. */
export function formatCountdown(ms: number): string {
  if (ms <= 0) return 'Ready!';
  const totalMins = Math.ceil(ms / 60_000);
  if (totalMins < 60) return `${totalMins}m`;
  const hours = Math.floor(totalMins / 60);
  if (hours < 24) return `${hours}h ${totalMins % 60}m`;
  return `${Math.floor(hours / 24)}d ${hours % 24}h`;
}

export function renderProgressBarPlain(
  percent: number,
  config: ProgressBarConfig = DEFAULT_PROGRESS_BAR_CONFIG,
): string {
  const { width, filledChar, emptyChar } = config;
  const clamped = Math.max(0, Math.min(100, percent));
  const filled = Math.round((clamped / 100) * width);
  return filledChar.repeat(filled) + emptyChar.repeat(width - filled);
}

type Level = 'red' | 'yellow' | 'green';

export function levelFor(remaining: number): Level {
  if (remaining < 20) return 'red';
  if (remaining < 50) return 'yellow';
  return 'green';
}

export function badgeFor(entry: Pick<ModelQuota, 'isExhausted' | 'remainingPercentage'>): string {
  if (entry.isExhausted) return 'EXHAUSTED';
  if (entry.remainingPercentage === null) return 'n/a';
  return `${entry.remainingPercentage.toFixed(0)}%`;
}

interface Row {
  name: string;
  entry: ModelQuota | QuotaPool;
}

function renderRows(rows: Row[], c: ChalkInstance): string[] {
  const nameWidth = Math.max(...rows.map((row) => row.name.length));
  return rows.map(({ name, entry }) => {
    const remaining = entry.remainingPercentage ?? 0;
    const paint = c[levelFor(remaining)];
    const bar = paint(renderProgressBarPlain(remaining));
    const badge = badgeFor(entry).padEnd(9);
    const countdown = formatCountdown(entry.timeUntilResetMs);
    const reset = countdown === 'Ready!' ? c.green(countdown) : c.dim(`resets in ${countdown}`);
    return `  ${name.padEnd(nameWidth)}  ${bar}  ${entry.isExhausted ? c.red.bold(badge) : paint(badge)}  ${reset}`;
  });
}

function renderCredits(label: string, block: CreditBlock | null, c: ChalkInstance): string | null {
  if (!block) return null;
  return `${label.padEnd(15)} ${block.available} / ${block.monthly} remaining (${block.remainingPercentage}%)`
    + c.dim(`  used ${block.used}`);
}

export interface RenderOptions {
  view?: ReportView;
  /** Defaults to the shared chalk instance */
  chalk?: ChalkInstance;
}

export function renderReport(report: QuotaReport, options: RenderOptions = {}): string {
  const c = options.chalk ?? chalk;
  const view = options.view ?? 'pools';
  const lines: string[] = [];

  const tier = report.planTier ? c.dim(` (${report.planTier})`) : '';
  lines.push(`${c.bold('Plan:')} ${report.planName}${tier}`);
  if (report.userName || report.userEmail) {
    const email = report.userEmail ? ` <${report.userEmail}>` : '';
    lines.push(`${c.bold('User:')} ${report.userName}${email}`);
  }

  const credits = [
    renderCredits('Prompt credits', report.promptCredits, c),
    renderCredits('Flow credits', report.flowCredits, c),
  ].filter((line): line is string => line !== null);
  if (credits.length > 0) {
    lines.push('', ...credits);
  }

  const rows: Row[] = view === 'pools'
    ? report.pools.map((pool) => ({
      name: pool.modelCount > 1 ? `${pool.name} (${pool.modelCount})` : pool.name,
      entry: pool,
    }))
    : report.models.map((model) => ({ name: model.label, entry: model }));

  lines.push('', c.bold(`${view === 'pools' ? 'Pools' : 'Models'} (${rows.length})`));
  if (rows.length === 0) {
    lines.push(c.dim('  No quota information reported'));
  } else {
    lines.push(...renderRows(rows, c));
  }

  lines.push('', c.dim(`Updated ${report.timestamp}`));
  return lines.join('\n');
}
