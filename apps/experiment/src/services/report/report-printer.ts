import type { GeoPosition } from '@signal-lab/domain';
import { totalDurationSec } from '../metrics/metrics-aggregator.js';
import type { PhaseSummary } from '../metrics/metrics-aggregator.js';

export type LineSink = (line: string) => void;

interface Column {
  title: string;
  width: number;
  align: 'left' | 'right';
}

const COLUMNS: readonly Column[] = [
  { title: 'Direction', width: 40, align: 'left' },
  { title: 'avg delay before', width: 20, align: 'right' },
  { title: 'avg delay after', width: 20, align: 'right' },
  { title: 'thruput before', width: 17, align: 'right' },
  { title: 'thruput after', width: 17, align: 'right' },
];

const MISSING = '-';

export interface ComparisonTotals {
  /** Positive when the treatment finished more trips. */
  tripsFinishedDelta: number;
  /** Positive when the treatment trips took less time in total. */
  totalTimeSavedSec: number;
}

/** Cells wider than their column are not truncated. */
export function formatRow(cells: readonly (string | number)[]): string {
  return COLUMNS.map((col, i) => {
    const text = String(cells[i] ?? '');
    return col.align === 'left' ? text.padEnd(col.width) : text.padStart(col.width);
  }).join(' ');
}

/** Rounded to a tenth rather than the raw float sum, so totals print without float noise. */
export function formatSeconds(sec: number): string {
  return String(Math.round(sec * 10) / 10);
}

export function compareTotals(baseline: PhaseSummary, treatment: PhaseSummary): ComparisonTotals {
  return {
    tripsFinishedDelta: treatment.tripDurations.size - baseline.tripDurations.size,
    totalTimeSavedSec:
      totalDurationSec(baseline.tripDurations) - totalDurationSec(treatment.tripDurations),
  };
}

/**
 * One row per direction in the baseline delay map, in its order. Directions
 * that only show up in the treatment are not listed.
 */
export function comparisonRows(baseline: PhaseSummary, treatment: PhaseSummary): string[] {
  const rows = [formatRow(COLUMNS.map((c) => c.title))];
  for (const [label, delayBefore] of baseline.meanDelays) {
    rows.push(
      formatRow([
        label,
        delayBefore,
        treatment.meanDelays.get(label) ?? MISSING,
        baseline.throughput.get(label) ?? MISSING,
        treatment.throughput.get(label) ?? MISSING,
      ]),
    );
  }
  return rows;
}

function describeCentroid(centroid: GeoPosition | null): string {
  return centroid
    ? `Average position of all active pedestrians: ${centroid.longitude}, ${centroid.latitude}`
    : 'No active pedestrians';
}

export class ReportPrinter {
  constructor(private readonly write: LineSink = (line) => console.log(line)) {}

  printPhase(label: string, summary: PhaseSummary): void {
    const durations = summary.tripDurations;
    this.write(
      `${label}: ${durations.size} finished trips, total of ${formatSeconds(totalDurationSec(durations))} seconds`,
    );
    this.write(describeCentroid(summary.pedestrianCentroid));
  }

  printComparison(baseline: PhaseSummary, treatment: PhaseSummary): void {
    const totals = compareTotals(baseline, treatment);
    this.write(
      `${totals.tripsFinishedDelta} more trips finished after the edits (higher is better)`,
    );
    this.write(
      `Experiment was ${formatSeconds(totals.totalTimeSavedSec)} seconds faster, over all trips`,
    );
    this.write('');
    for (const row of comparisonRows(baseline, treatment)) this.write(row);
  }

  print(baseline: PhaseSummary, treatment: PhaseSummary): void {
    this.printPhase('Baseline', baseline);
    this.write('');
    this.printPhase('Experiment', treatment);
    this.write('');
    this.printComparison(baseline, treatment);
  }
}
