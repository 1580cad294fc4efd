/**
 * Trajectory Simulator
 *
 * Piecewise-exponential growth curve through the passage endpoints, for
 * plotting. Within passage i, cells(t) = input · exp(r · (t − start)) with
 * r = ln(output / input) / duration. Re-seeding carries the harvest into the
 * next passage, so consecutive segments meet at the boundary.
 */

import type { DegenerateReason, ExpansionPlan, TrajectorySample, TrajectorySegment } from '../types/expansion';
import { linspace } from '../../../utils/inputParsing';

export interface TrajectoryOptions {
  samplesPerPassage?: number;
}

export const DEFAULT_SAMPLES_PER_PASSAGE = 25;

type PassageSource = Pick<ExpansionPlan, 'passages'>;

export function describeSegments(plan: PassageSource): TrajectorySegment[] {
  return plan.passages.map((p) => {
    const degenerate = degenerateReason(p.inputCells, p.outputCells, p.durationDays);

    if (degenerate) {
      console.warn(`Passage ${p.index}: degenerate input (${degenerate}), drawing a flat segment at ${flatLevel(p.outputCells)} cells`);
    }

    return {
      passageIndex: p.index,
      startDay: p.startDay,
      endDay: p.startDay + (degenerate === 'zero_duration' ? 0 : p.durationDays),
      inputCells: p.inputCells,
      outputCells: p.outputCells,
      rate: degenerate ? 0 : Math.log(p.outputCells / p.inputCells) / p.durationDays,
      degenerate,
    };
  });
}

/**
 * Lazy sample sequence. Segments are described once per call; every
 * iteration regenerates the samples from them.
 */
export function simulateTrajectory(plan: PassageSource, options: TrajectoryOptions = {}): Iterable<TrajectorySample> {
  return trajectoryFromSegments(describeSegments(plan), options);
}

export function trajectoryFromSegments(
  segments: readonly TrajectorySegment[],
  options: TrajectoryOptions = {}
): Iterable<TrajectorySample> {
  const samplesPerPassage = Math.max(2, Math.floor(options.samplesPerPassage ?? DEFAULT_SAMPLES_PER_PASSAGE));

  return {
    [Symbol.iterator]: () => generateSamples(segments, samplesPerPassage),
  };
}

export function sampleTrajectory(plan: PassageSource, options: TrajectoryOptions = {}): TrajectorySample[] {
  return Array.from(simulateTrajectory(plan, options));
}

export function cellsAt(segment: TrajectorySegment, day: number): number {
  if (segment.degenerate) return flatLevel(segment.outputCells);
  return segment.inputCells * Math.exp(segment.rate * (day - segment.startDay));
}

/* ---------------- helpers ---------------- */

function degenerateReason(inputCells: number, outputCells: number, durationDays: number): DegenerateReason | null {
  if (!Number.isFinite(durationDays) || durationDays <= 0) return 'zero_duration';
  if (!Number.isFinite(inputCells) || inputCells <= 0) return 'zero_input';
  if (!Number.isFinite(outputCells) || outputCells <= 0) return 'zero_output';
  return null;
}

// flat segments sit at the output, or at zero when there is no usable output
function flatLevel(outputCells: number): number {
  return Number.isFinite(outputCells) && outputCells > 0 ? outputCells : 0;
}

function* generateSamples(
  segments: readonly TrajectorySegment[],
  samplesPerPassage: number
): Generator<TrajectorySample> {
  for (const [i, segment] of segments.entries()) {
    if (segment.degenerate === 'zero_duration') {
      yield { day: segment.startDay, cells: flatLevel(segment.outputCells), passageIndex: segment.passageIndex };
      continue;
    }

    const days = linspace(segment.startDay, segment.endDay, samplesPerPassage);
    // later passages share their first point with the previous harvest
    const first = i === 0 ? 0 : 1;

    for (let j = first; j < days.length; j++) {
      const cells = j === days.length - 1 ? cellsAtEnd(segment) : cellsAt(segment, days[j]);
      yield { day: days[j], cells, passageIndex: segment.passageIndex };
    }
  }
}

function cellsAtEnd(segment: TrajectorySegment): number {
  return segment.degenerate ? flatLevel(segment.outputCells) : segment.outputCells;
}
