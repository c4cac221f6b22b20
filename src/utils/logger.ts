/**
 * Terminal logger for hintcfg.
 *
 * All output goes to stderr so stdout stays clean for JSON and rendered
 * configurations.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function valid(file: string, sourceCount: number, rowCount: number): void {
  write(`✅ ${file}: ${String(sourceCount)} sources, ${String(rowCount)} feature rows`);
}

export function invalid(file: string, kind: string, message: string): void {
  write(`❌ ${file}: [${kind}] ${message}`);
}
