import type { ExtrinsicConfig, FeatureWeightRow } from '../schema/index.js';

// ── Numbers ──────────────────────────────────────────────────
// Exponent form for very large or small magnitudes; both forms parse
// back to the identical double.

export function formatNumber(value: number): string {
  if (Object.is(value, -0)) return '-0';
  const magnitude = Math.abs(value);
  if (magnitude !== 0 && (magnitude >= 1e6 || magnitude < 1e-3)) {
    return value.toExponential();
  }
  return String(value);
}

// ── Rows ─────────────────────────────────────────────────────

function rowCells(row: FeatureWeightRow): string[] {
  const cells = [row.feature, String(row.boundaryFlag), row.params.map(formatNumber).join(' ')];
  for (const weight of row.weights) {
    const numbers = [weight.malus, weight.bonus];
    if ('curve' in weight && weight.curve !== undefined) {
      numbers.push(weight.curve.minFragmentLength, weight.curve.fullBonus);
    }
    cells.push([weight.source, ...numbers.map(formatNumber)].join(' '));
  }
  return cells;
}

// Feature, flag and params are right-aligned; source groups left-aligned.
function alignRows(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const cells of rows) {
    cells.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((cells) =>
    cells
      .map((cell, i) => (i < 3 ? cell.padStart(widths[i] ?? 0) : cell.padEnd(widths[i] ?? 0)))
      .join('  ')
      .trimEnd(),
  );
}

// ── Public API ───────────────────────────────────────────────

/** Render a configuration back to the section-delimited text format. */
export function serializeExtrinsicConfig(config: ExtrinsicConfig): string {
  const lines: string[] = [];

  lines.push('[SOURCES]');
  lines.push(config.sources.join(' '));
  lines.push('');

  if (config.sourceParameters.length > 0) {
    lines.push('[SOURCE-PARAMETERS]');
    for (const parameter of config.sourceParameters) {
      lines.push([parameter.source, ...parameter.flags].join(' '));
    }
    lines.push('');
  }

  if (config.group !== undefined) {
    lines.push('[GROUP]');
    lines.push(config.group);
    lines.push('');
  }

  lines.push('[GENERAL]');
  lines.push(...alignRows(config.features.map(rowCells)));

  return lines.join('\n') + '\n';
}
