/**
 * EdgeFinder
 * ==========
 *
 * Transitions in boolean signals: flight/ground, contact/no-contact,
 * heel-strike markers.
 *
 * @module segmentation/EdgeFinder
 */

/** Maximal run of `true` samples; both ends inclusive */
export interface Run {
  start: number;
  end: number;
}

/**
 * Find every maximal contiguous `true` run.
 *
 * The flags are padded with `false` on both sides before differencing, so
 * runs that touch the first or last sample are still reported.
 */
export function findRuns(flags: readonly boolean[]): Run[] {
  const runs: Run[] = [];
  const n = flags.length;
  let start = -1;

  // diff over [false, ...flags, false]: +1 opens a run, -1 closes it
  for (let i = 0; i <= n; i++) {
    const previous = i > 0 ? flags[i - 1] : false;
    const current = i < n ? flags[i] : false;
    const diff = Number(current) - Number(previous);

    if (diff === 1) {
      start = i;
    } else if (diff === -1) {
      runs.push({ start, end: i - 1 });
    }
  }

  return runs;
}

/**
 * Indices where the signal rises (`false` -> `true`). The first sample is
 * never a rising edge.
 */
export function findRisingEdges(flags: readonly boolean[]): number[] {
  const edges: number[] = [];
  for (let i = 1; i < flags.length; i++) {
    if (!flags[i - 1] && flags[i]) edges.push(i);
  }
  return edges;
}

/**
 * Indices where the signal falls (`true` -> `false`), considering only pairs
 * of consecutive samples that both lie in `searchRange`.
 *
 * @param searchRange - ascending sample indices; defaults to the whole signal
 */
export function findFallingEdges(
  flags: readonly boolean[],
  searchRange?: readonly number[],
): number[] {
  const range =
    searchRange?.filter((i) => i >= 0 && i < flags.length) ??
    flags.map((_, i) => i);
  const edges: number[] = [];

  for (let k = 1; k < range.length; k++) {
    if (flags[range[k - 1]] && !flags[range[k]]) edges.push(range[k]);
  }

  return edges;
}
