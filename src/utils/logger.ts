/**
 * Live execution logger for navpilot.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Emoji prefixes give instant visual context in the terminal.
 * `LOG_LEVEL` (debug | info | warn | error | silent) sets the threshold.
 */

// ── Level handling ──────────────────────────────────────────

const LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env['LOG_LEVEL']?.toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : 'info';
}

let threshold: LogLevel = levelFromEnv();

export function setLevel(level: LogLevel): void {
  threshold = level;
}

// ── Core write ──────────────────────────────────────────────

function write(level: Exclude<LogLevel, 'silent'>, message: string): void {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(threshold)) return;
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function debug(message: string): void {
  write('debug', `🐛 ${message}`);
}

export function info(message: string): void {
  write('info', `ℹ️  ${message}`);
}

export function detail(message: string): void {
  write('info', `   ${message}`);
}

export function section(title: string): void {
  write('info', `\n${'─'.repeat(50)}`);
  write('info', `▶  ${title}`);
  write('info', `${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write('warn', `⚠️  ${message}`);
}

export function error(message: string): void {
  write('error', `💥 ${message}`);
}

export function step(index: number, total: number, description: string): void {
  write('info', `📋 [${String(index + 1)}/${String(total)}] ${description}`);
}

export function stepResult(
  index: number,
  total: number,
  success: boolean,
  description: string,
): void {
  const icon = success ? '✅' : '❌';
  write('info', `${icon} [${String(index + 1)}/${String(total)}] ${description}`);
}

export function llm(message: string): void {
  write('info', `🧠 ${message}`);
}

export function session(message: string): void {
  write('info', `🌐 ${message}`);
}

export function run(message: string): void {
  write('info', `🏁 ${message}`);
}
