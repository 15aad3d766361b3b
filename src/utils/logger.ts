/**
 * Live execution logger for taskrelay.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function attempt(strategy: string, note?: string): void {
  write(`🧭 ${strategy}${note ? ` (${note})` : ''}`);
}

export function attemptResult(
  strategy: string,
  success: boolean,
  summary: string,
): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} ${strategy}: ${summary.split('\n')[0] ?? ''}`);
}

export function retry(attemptIndex: number, total: number, waitMs: number): void {
  write(
    `🔁 Retry ${String(attemptIndex + 1)}/${String(total - 1)} in ${String(waitMs)}ms`,
  );
}

export function listening(url: string): void {
  write(`🌐 Listening on ${url}`);
}
