// ─── Temporal Split: causal train/test partition and expanding CV folds ─────

import { subMonths } from "date-fns";
import { EmptyPartitionError, InsufficientHistoryError } from "./errors";
import { formatDate } from "./panel-loader";
import type { Cutoff, PanelRecord } from "./types";

export interface TemporalSplit {
  train: PanelRecord[];
  test: PanelRecord[];
  cutoff: Date;
}

export function resolveCutoff(panel: readonly PanelRecord[], cutoff: Cutoff): Date {
  if ("date" in cutoff) return cutoff.date;
  if (!panel.length) throw new EmptyPartitionError("Cannot resolve a cutoff on an empty panel");
  const max = panel.reduce((m, r) => (r.date > m ? r.date : m), panel[0].date);
  return subMonths(max, cutoff.periodsBeforeMax);
}

/** train = date < cutoff, test = date ≥ cutoff; one global boundary. */
export function temporalSplit(panel: readonly PanelRecord[], cutoff: Cutoff): TemporalSplit {
  const at = resolveCutoff(panel, cutoff);
  const train = panel.filter((r) => r.date < at);
  const test = panel.filter((r) => r.date >= at);
  if (!train.length) throw new EmptyPartitionError(`No training rows before ${formatDate(at)}`);
  if (!test.length) throw new EmptyPartitionError(`No test rows on or after ${formatDate(at)}`);
  return { train, test, cutoff: at };
}

export interface TimeSeriesFold {
  fold: number;
  trainDates: Date[];
  testDates: Date[];
}

/**
 * Expanding-window folds over the distinct dates: fold k trains on the first
 * k blocks and tests on block k+1.
 */
export function timeSeriesFolds(panel: readonly PanelRecord[], nSplits: number): TimeSeriesFold[] {
  const dates = [...new Set(panel.map((r) => r.date.getTime()))].sort((a, b) => a - b).map((t) => new Date(t));
  if (nSplits < 1 || dates.length < nSplits + 1) {
    throw new InsufficientHistoryError(`${dates.length} distinct dates cannot form ${nSplits} folds`);
  }
  const testSize = Math.floor(dates.length / (nSplits + 1));
  const firstTrain = dates.length - nSplits * testSize;

  const folds: TimeSeriesFold[] = [];
  for (let k = 0; k < nSplits; k++) {
    const trainEnd = firstTrain + k * testSize;
    folds.push({
      fold: k + 1,
      trainDates: dates.slice(0, trainEnd),
      testDates: dates.slice(trainEnd, trainEnd + testSize),
    });
  }
  return folds;
}

export function selectDates(panel: readonly PanelRecord[], dates: Date[]): PanelRecord[] {
  const wanted = new Set(dates.map((d) => d.getTime()));
  return panel.filter((r) => wanted.has(r.date.getTime()));
}
