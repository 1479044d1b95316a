export type IdClass = 'user' | 'group';

export type IdSide = 'container' | 'host';

// Presentation order: every user record precedes every group record.
export const ID_CLASSES: readonly IdClass[] = ['user', 'group'];

// Root (0) is never mapped; mapping it would hand out root on the host.
export const ID_MIN = 1;
export const ID_MAX = 65536;

// Size of the container id space covered per class: [0, ID_SPACE).
export const ID_SPACE = 65536;

// Unmapped container ids land at FILLER_OFFSET + id on the host.
export const FILLER_OFFSET = 100000;

export const ID_CLASS_INFO: Record<IdClass, { letter: 'u' | 'g'; label: string; subidFile: string }> = {
  user: { letter: 'u', label: 'UID', subidFile: '/etc/subuid' },
  group: { letter: 'g', label: 'GID', subidFile: '/etc/subgid' },
};

export interface PointMapping {
  readonly idClass: IdClass;
  readonly containerId: number;
  readonly hostId: number;
}

export type RangeKind = 'mapped' | 'filler';

/**
 * Container ids [containerStart, containerStart + length) map onto
 * host ids [hostStart, hostStart + length).
 */
export interface RangeRecord {
  readonly idClass: IdClass;
  readonly kind: RangeKind;
  readonly containerStart: number;
  readonly hostStart: number;
  readonly length: number;
}

export function compareIdClass(a: IdClass, b: IdClass): number {
  return ID_CLASSES.indexOf(a) - ID_CLASSES.indexOf(b);
}

export function isInIdRange(id: number): boolean {
  return Number.isInteger(id) && id >= ID_MIN && id <= ID_MAX;
}
