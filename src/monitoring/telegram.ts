/**
 * Telegram operator notifications.
 *
 * Disabled unless TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are both set.
 * Outbound messages never throw: failures are logged and the render carries on.
 */
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

export type AlertLevel = 'info' | 'warning' | 'critical';

export function telegramEnabled(): boolean {
  return Boolean(env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID);
}

async function send(text: string): Promise<void> {
  if (!telegramEnabled()) return;
  try {
    const res = await fetch(`https://api.telegram.org/bot${env.TELEGRAM_BOT_TOKEN}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: env.TELEGRAM_CHAT_ID, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) logger.warn('Telegram: sendMessage failed', { status: res.status });
  } catch (err) {
    logger.warn('Telegram: unreachable', { error: String(err) });
  }
}

function escapeHtml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export async function sendAlert(message: string, level: AlertLevel = 'info'): Promise<void> {
  const prefix: Record<AlertLevel, string> = {
    info:     'ℹ️',
    warning:  '⚠️',
    critical: '🚨',
  };
  await send(`${prefix[level]} <b>${level.toUpperCase()}</b>\n${escapeHtml(message)}`);
}

export async function sendRunSummary(summary: {
  project: string;
  rendered: number;
  cached: number;
  failed: number;
  providerCalls: number;
  moviePath: string | null;
}): Promise<void> {
  const text =
    `🎬 <b>Render finished</b> <code>${escapeHtml(summary.project)}</code>\n` +
    `Scenes rendered: ${summary.rendered}\n` +
    `Scenes from cache: ${summary.cached}\n` +
    `Scenes failed: ${summary.failed}\n` +
    `Provider calls: ${summary.providerCalls}\n` +
    (summary.moviePath ? `Movie: <code>${escapeHtml(summary.moviePath)}</code>` : 'Movie: not assembled');
  await send(text);
}
