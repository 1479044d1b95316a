import { NoInputError, StructuralConflictError } from './errors';
import { FILLER_OFFSET, ID_CLASSES, ID_SPACE, compareIdClass, type IdClass, type PointMapping, type RangeRecord } from './ids';
import { type IdmapInput, isEmptyInput, normalizeMappings } from './normalize';

export type { IdClass, PointMapping, RangeRecord } from './ids';
export type { IdmapInput } from './normalize';

export interface Idmap {
  points: PointMapping[];
  records: RangeRecord[];
}

function filler(idClass: IdClass, containerStart: number, length: number): RangeRecord {
  return { idClass, kind: 'filler', containerStart, hostStart: containerStart + FILLER_OFFSET, length };
}

export function comparePoints(a: PointMapping, b: PointMapping): number {
  return compareIdClass(a.idClass, b.idClass) || a.containerId - b.containerId;
}

// Cover [0, ID_SPACE) for one class: each point gets a length-1 record,
// every gap around them gets a filler at the default offset.
export function partitionClass(idClass: IdClass, points: readonly PointMapping[]): RangeRecord[] {
  const sorted = points
    .filter((p) => p.idClass === idClass)
    .sort(comparePoints);
  if (sorted.length === 0) return [filler(idClass, 0, ID_SPACE)];

  const records: RangeRecord[] = [];
  let next = 0;
  let prev: PointMapping | undefined;
  for (const p of sorted) {
    if (prev && p.containerId <= prev.containerId) {
      throw new StructuralConflictError(idClass, p.containerId, [prev.hostId, p.hostId]);
    }
    if (p.containerId > next) records.push(filler(idClass, next, p.containerId - next));
    records.push({ idClass, kind: 'mapped', containerStart: p.containerId, hostStart: p.hostId, length: 1 });
    next = p.containerId + 1;
    prev = p;
  }
  if (next < ID_SPACE) records.push(filler(idClass, next, ID_SPACE - next));
  return records;
}

export function partition(points: readonly PointMapping[]): RangeRecord[] {
  return ID_CLASSES.flatMap((idClass) => partitionClass(idClass, points));
}

export function generateIdmap(input: IdmapInput): Idmap {
  if (isEmptyInput(input)) throw new NoInputError();
  const points = normalizeMappings(input);
  return { points, records: partition(points) };
}
